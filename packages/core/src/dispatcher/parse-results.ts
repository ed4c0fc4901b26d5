/**
 * @fileoverview Parse Results
 */

import type { CommandContextBuilder } from '../context/command-context-builder.js';
import type { CommandSyntaxError } from '../errors/syntax-error.js';
import type { ImmutableStringReader } from '../reader/string-reader.js';
import type { CommandNode } from '../tree/command-node.js';

/**
 * Outcome of parsing one line: the bound context, the reader at the point
 * parsing stopped, and the error each rejected candidate node raised.
 * Parsing never throws for bad input; execution decides what to report.
 */
export class ParseResults<S> {
  constructor(
    readonly context: CommandContextBuilder<S>,
    readonly reader: ImmutableStringReader,
    readonly exceptions: ReadonlyMap<CommandNode<S>, CommandSyntaxError> = new Map()
  ) {}

  /** Whether input was left unconsumed */
  hasRemaining(): boolean {
    return this.reader.canRead();
  }
}
