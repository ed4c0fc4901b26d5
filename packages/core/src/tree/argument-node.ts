/**
 * @fileoverview Argument Node
 *
 * Binds a typed value parsed from the input under the node's name.
 */

import { RequiredArgumentBuilder } from '../builder/required-argument-builder.js';
import type { CommandContext } from '../context/command-context.js';
import type { CommandContextBuilder } from '../context/command-context-builder.js';
import { StringRange } from '../context/string-range.js';
import { isCommandSyntaxError } from '../errors/syntax-error.js';
import { StringReader } from '../reader/string-reader.js';
import { Suggestions } from '../suggestion/suggestions.js';
import type { SuggestionsBuilder } from '../suggestion/suggestions-builder.js';
import { ARGUMENT_SEPARATOR, CommandNode, type CommandNodeOptions } from './command-node.js';
import type { ArgumentType, SuggestionProvider } from './types.js';

const USAGE_ARGUMENT_OPEN = '<';
const USAGE_ARGUMENT_CLOSE = '>';

export interface ArgumentNodeOptions<S> extends CommandNodeOptions<S> {
  customSuggestions?: SuggestionProvider<S> | null;
}

/**
 * Node parsing a typed value. Its name is the key the value is bound under.
 */
export class ArgumentCommandNode<S, T> extends CommandNode<S> {
  readonly kind = 'argument' as const;
  private readonly customSuggestions: SuggestionProvider<S> | null;

  constructor(
    readonly name: string,
    readonly type: ArgumentType<T>,
    options: ArgumentNodeOptions<S> = {}
  ) {
    super(options);
    this.customSuggestions = options.customSuggestions ?? null;
  }

  getType(): ArgumentType<T> {
    return this.type;
  }

  getCustomSuggestions(): SuggestionProvider<S> | null {
    return this.customSuggestions;
  }

  getName(): string {
    return this.name;
  }

  protected override sameVariant(other: CommandNode<S>): boolean {
    if (!(other instanceof ArgumentCommandNode)) {
      return false;
    }
    const otherType: unknown = other.type;
    return this.type === otherType || (this.type.equals?.(otherType) ?? false);
  }

  getUsageText(): string {
    return `${USAGE_ARGUMENT_OPEN}${this.name}${USAGE_ARGUMENT_CLOSE}`;
  }

  parse(reader: StringReader, context: CommandContextBuilder<S>): void {
    const start = reader.getCursor();
    const result = this.type.parse(reader, context);
    const range = StringRange.between(start, reader.getCursor());
    context.withArgument(this.name, { range, result });
    context.withNode(this, range);
  }

  listSuggestions(context: CommandContext<S>, builder: SuggestionsBuilder): Promise<Suggestions> {
    if (this.customSuggestions !== null) {
      return this.customSuggestions(context, builder);
    }
    if (this.type.listSuggestions !== undefined) {
      return this.type.listSuggestions(context, builder);
    }
    return Suggestions.empty();
  }

  isValidInput(input: string): boolean {
    const reader = new StringReader(input);
    try {
      this.type.parse(reader);
      return !reader.canRead() || reader.peek() === ARGUMENT_SEPARATOR;
    } catch (error) {
      if (isCommandSyntaxError(error)) {
        return false;
      }
      throw error;
    }
  }

  getExamples(): readonly string[] {
    return this.type.getExamples?.() ?? [];
  }

  createBuilder(): RequiredArgumentBuilder<S, T> {
    const builder = new RequiredArgumentBuilder<S, T>(this.name, this.type)
      .requires(this.getRequirement())
      .requiresInContext(this.getContextRequirement())
      .forward(this.getRedirect(), this.getRedirectModifier(), this.isFork())
      .suggests(this.customSuggestions);
    const command = this.getCommand();
    if (command !== null) {
      builder.executes(command);
    }
    return builder;
  }

  protected getSortedKey(): string {
    return this.name;
  }

  override toString(): string {
    return `<argument ${this.name}:${String(this.type)}>`;
  }
}
