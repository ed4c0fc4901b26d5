/**
 * @fileoverview Boolean Argument
 */

import type { ArgumentType, CommandContext, StringReader, Suggestions, SuggestionsBuilder } from '@trellis/core';

const EXAMPLES = ['true', 'false'] as const;

export class BoolArgumentType implements ArgumentType<boolean> {
  parse(reader: StringReader): boolean {
    return reader.readBoolean();
  }

  listSuggestions<S>(_context: CommandContext<S>, builder: SuggestionsBuilder): Promise<Suggestions> {
    for (const value of EXAMPLES) {
      if (value.startsWith(builder.remainingLowerCase)) {
        builder.suggest(value);
      }
    }
    return builder.buildPromise();
  }

  getExamples(): readonly string[] {
    return EXAMPLES;
  }

  equals(other: unknown): boolean {
    return other instanceof BoolArgumentType;
  }

  toString(): string {
    return 'bool()';
  }
}

export function bool(): BoolArgumentType {
  return new BoolArgumentType();
}

export function getBool<S>(context: CommandContext<S>, name: string): boolean {
  return context.getArgumentAs(name, (value): value is boolean => typeof value === 'boolean', 'boolean');
}
