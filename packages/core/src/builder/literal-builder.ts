/**
 * @fileoverview Literal Builder
 */

import { LiteralCommandNode } from '../tree/literal-node.js';
import { ArgumentBuilder } from './argument-builder.js';

export class LiteralArgumentBuilder<S> extends ArgumentBuilder<S> {
  constructor(readonly literal: string) {
    super();
  }

  getLiteral(): string {
    return this.literal;
  }

  build(): LiteralCommandNode<S> {
    return this.attachArguments(new LiteralCommandNode<S>(this.literal, this.nodeOptions()));
  }
}

/**
 * Start a keyword node
 *
 * @example
 * dispatcher.register(
 *   literal<Player>('teleport').then(argument<Player, string>('target', word()).executes(run))
 * );
 */
export function literal<S>(name: string): LiteralArgumentBuilder<S> {
  return new LiteralArgumentBuilder<S>(name);
}
