/**
 * @fileoverview Root Node
 */

import type { ArgumentBuilder } from '../builder/argument-builder.js';
import type { CommandContext } from '../context/command-context.js';
import type { CommandContextBuilder } from '../context/command-context-builder.js';
import { TreeStructureError } from '../errors/command-errors.js';
import type { StringReader } from '../reader/string-reader.js';
import { Suggestions } from '../suggestion/suggestions.js';
import type { SuggestionsBuilder } from '../suggestion/suggestions-builder.js';
import { CommandNode } from './command-node.js';

/**
 * Unnamed top of a command tree. Never matched and never a child.
 */
export class RootCommandNode<S> extends CommandNode<S> {
  readonly kind = 'root' as const;

  constructor() {
    super({});
  }

  getName(): string {
    return '';
  }

  getUsageText(): string {
    return '';
  }

  parse(_reader: StringReader, _context: CommandContextBuilder<S>): void {}

  listSuggestions(_context: CommandContext<S>, _builder: SuggestionsBuilder): Promise<Suggestions> {
    return Suggestions.empty();
  }

  isValidInput(_input: string): boolean {
    return false;
  }

  getExamples(): readonly string[] {
    return [];
  }

  createBuilder(): ArgumentBuilder<S> {
    throw new TreeStructureError('Cannot convert a root node into a builder');
  }

  protected getSortedKey(): string {
    return '';
  }

  override toString(): string {
    return '<root>';
  }
}
