/**
 * @fileoverview Argument Builder for typed nodes
 */

import { ArgumentCommandNode } from '../tree/argument-node.js';
import type { ArgumentType, SuggestionProvider } from '../tree/types.js';
import { ArgumentBuilder } from './argument-builder.js';

export class RequiredArgumentBuilder<S, T> extends ArgumentBuilder<S> {
  private suggestionsProvider: SuggestionProvider<S> | null = null;

  constructor(
    readonly name: string,
    readonly type: ArgumentType<T>
  ) {
    super();
  }

  getName(): string {
    return this.name;
  }

  getType(): ArgumentType<T> {
    return this.type;
  }

  /**
   * Replace the type's own suggestions for this node
   */
  suggests(provider: SuggestionProvider<S> | null): this {
    this.suggestionsProvider = provider;
    return this;
  }

  getSuggestionsProvider(): SuggestionProvider<S> | null {
    return this.suggestionsProvider;
  }

  build(): ArgumentCommandNode<S, T> {
    return this.attachArguments(
      new ArgumentCommandNode<S, T>(this.name, this.type, {
        ...this.nodeOptions(),
        customSuggestions: this.suggestionsProvider,
      })
    );
  }
}

/**
 * Start a typed argument node bound under `name`
 */
export function argument<S, T>(name: string, type: ArgumentType<T>): RequiredArgumentBuilder<S, T> {
  return new RequiredArgumentBuilder<S, T>(name, type);
}
