/**
 * @fileoverview Context Types
 */

import type { CommandNode } from '../tree/command-node.js';
import type { StringRange } from './string-range.js';

/**
 * A value an argument type produced, and where it was read from
 */
export interface ParsedArgument<T> {
  readonly range: StringRange;
  readonly result: T;
}

/**
 * A node matched during parsing, and the input it consumed
 */
export interface ParsedCommandNode<S> {
  readonly node: CommandNode<S>;
  readonly range: StringRange;
}

/**
 * Node whose children are candidates at a cursor, and where their
 * suggestions start
 */
export interface SuggestionContext<S> {
  readonly parent: CommandNode<S>;
  readonly startPos: number;
}
