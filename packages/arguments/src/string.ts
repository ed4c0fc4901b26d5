/**
 * @fileoverview String Arguments
 */

import { StringReader, type ArgumentType, type CommandContext } from '@trellis/core';

/**
 * - `word`: a single unquoted token
 * - `phrase`: a token, or a quoted string that may contain spaces
 * - `greedy`: everything up to the end of the input
 */
export type StringType = 'word' | 'phrase' | 'greedy';

const EXAMPLES: Record<StringType, readonly string[]> = {
  word: ['word', 'words_with_underscores'],
  phrase: ['"quoted phrase"', 'word', '""'],
  greedy: ['word', 'words with spaces', '"and symbols"'],
};

export class StringArgumentType implements ArgumentType<string> {
  constructor(readonly type: StringType) {}

  parse(reader: StringReader): string {
    switch (this.type) {
      case 'greedy': {
        const text = reader.getRemaining();
        reader.setCursor(reader.getTotalLength());
        return text;
      }
      case 'word':
        return reader.readUnquotedString();
      case 'phrase':
        return reader.readString();
    }
  }

  getExamples(): readonly string[] {
    return EXAMPLES[this.type];
  }

  equals(other: unknown): boolean {
    return other instanceof StringArgumentType && other.type === this.type;
  }

  toString(): string {
    return 'string()';
  }
}

export function word(): StringArgumentType {
  return new StringArgumentType('word');
}

export function string(): StringArgumentType {
  return new StringArgumentType('phrase');
}

export function greedyString(): StringArgumentType {
  return new StringArgumentType('greedy');
}

export function getString<S>(context: CommandContext<S>, name: string): string {
  return context.getArgumentAs(name, (value): value is string => typeof value === 'string', 'string');
}

/**
 * Quote `input` when it would not survive being read back as a single
 * unquoted token
 */
export function escapeIfRequired(input: string): string {
  for (const c of input) {
    if (!StringReader.isAllowedInUnquotedString(c)) {
      return escape(input);
    }
  }
  return input;
}

function escape(input: string): string {
  let result = '"';
  for (const c of input) {
    if (c === '\\' || c === '"') {
      result += '\\';
    }
    result += c;
  }
  return `${result}"`;
}
