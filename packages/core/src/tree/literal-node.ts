/**
 * @fileoverview Literal Node
 *
 * Matches one keyword exactly; suggests it case-insensitively.
 */

import { LiteralArgumentBuilder } from '../builder/literal-builder.js';
import type { CommandContext } from '../context/command-context.js';
import type { CommandContextBuilder } from '../context/command-context-builder.js';
import { StringRange } from '../context/string-range.js';
import { BuiltInErrors } from '../errors/built-in.js';
import { StringReader } from '../reader/string-reader.js';
import { Suggestions } from '../suggestion/suggestions.js';
import type { SuggestionsBuilder } from '../suggestion/suggestions-builder.js';
import { ARGUMENT_SEPARATOR, CommandNode, type CommandNodeOptions } from './command-node.js';

/**
 * Node matching one exact keyword
 */
export class LiteralCommandNode<S> extends CommandNode<S> {
  readonly kind = 'literal' as const;
  private readonly literalLowerCase: string;

  constructor(
    readonly literal: string,
    options: CommandNodeOptions<S> = {}
  ) {
    super(options);
    this.literalLowerCase = literal.toLowerCase();
  }

  getLiteral(): string {
    return this.literal;
  }

  getName(): string {
    return this.literal;
  }

  parse(reader: StringReader, context: CommandContextBuilder<S>): void {
    const start = reader.getCursor();
    const end = this.match(reader);
    if (end > -1) {
      context.withNode(this, StringRange.between(start, end));
      return;
    }
    throw BuiltInErrors.literalIncorrect.createWithContext(reader, this.literal);
  }

  /**
   * Consume the literal when it is followed by a separator or the end of
   * input. Returns the end position, or -1 with the cursor untouched.
   */
  private match(reader: StringReader): number {
    const start = reader.getCursor();
    if (reader.canRead(this.literal.length)) {
      const end = start + this.literal.length;
      if (reader.getString().substring(start, end) === this.literal) {
        reader.setCursor(end);
        if (!reader.canRead() || reader.peek() === ARGUMENT_SEPARATOR) {
          return end;
        }
        reader.setCursor(start);
      }
    }
    return -1;
  }

  listSuggestions(_context: CommandContext<S>, builder: SuggestionsBuilder): Promise<Suggestions> {
    if (this.literalLowerCase.startsWith(builder.remainingLowerCase)) {
      return builder.suggest(this.literal).buildPromise();
    }
    return Suggestions.empty();
  }

  isValidInput(input: string): boolean {
    return this.match(new StringReader(input)) > -1;
  }

  getUsageText(): string {
    return this.literal;
  }

  getExamples(): readonly string[] {
    return [this.literal];
  }

  createBuilder(): LiteralArgumentBuilder<S> {
    const builder = new LiteralArgumentBuilder<S>(this.literal)
      .requires(this.getRequirement())
      .requiresInContext(this.getContextRequirement())
      .forward(this.getRedirect(), this.getRedirectModifier(), this.isFork());
    const command = this.getCommand();
    if (command !== null) {
      builder.executes(command);
    }
    return builder;
  }

  protected getSortedKey(): string {
    return this.literal;
  }

  override toString(): string {
    return `<literal ${this.literal}>`;
  }
}
