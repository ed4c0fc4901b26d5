/**
 * @fileoverview Command Context Builder
 *
 * Mutable bound context grown during a parse. The parser copies it before
 * each candidate so sibling attempts never see each other's bindings.
 */

import { IllegalStateError } from '../errors/command-errors.js';
import type { CommandNode } from '../tree/command-node.js';
import type { Command, RedirectModifier } from '../tree/types.js';
import { CommandContext } from './command-context.js';
import { StringRange } from './string-range.js';
import type { ParsedArgument, ParsedCommandNode, SuggestionContext } from './types.js';

export class CommandContextBuilder<S> {
  private readonly arguments = new Map<string, ParsedArgument<unknown>>();
  private readonly nodes: ParsedCommandNode<S>[] = [];
  private source: S;
  private command: Command<S> | null = null;
  private child: CommandContextBuilder<S> | null = null;
  private range: StringRange;
  private modifier: RedirectModifier<S> | null = null;
  private forks = false;

  constructor(
    source: S,
    private readonly rootNode: CommandNode<S>,
    start: number
  ) {
    this.source = source;
    this.range = StringRange.at(start);
  }

  withSource(source: S): this {
    this.source = source;
    return this;
  }

  getSource(): S {
    return this.source;
  }

  getRootNode(): CommandNode<S> {
    return this.rootNode;
  }

  withArgument(name: string, argument: ParsedArgument<unknown>): this {
    this.arguments.set(name, argument);
    return this;
  }

  getArguments(): ReadonlyMap<string, ParsedArgument<unknown>> {
    return this.arguments;
  }

  withCommand(command: Command<S> | null): this {
    this.command = command;
    return this;
  }

  getCommand(): Command<S> | null {
    return this.command;
  }

  /**
   * Record a matched node. The node's redirect settings become the
   * context's, since only the last node decides where execution goes.
   */
  withNode(node: CommandNode<S>, range: StringRange): this {
    this.nodes.push({ node, range });
    this.range = StringRange.encompassing(this.range, range);
    this.modifier = node.getRedirectModifier();
    this.forks = node.isFork();
    return this;
  }

  getNodes(): readonly ParsedCommandNode<S>[] {
    return this.nodes;
  }

  withChild(child: CommandContextBuilder<S>): this {
    this.child = child;
    return this;
  }

  getChild(): CommandContextBuilder<S> | null {
    return this.child;
  }

  getLastChild(): CommandContextBuilder<S> {
    let result: CommandContextBuilder<S> = this;
    while (result.child !== null) {
      result = result.child;
    }
    return result;
  }

  getRange(): StringRange {
    return this.range;
  }

  copy(): CommandContextBuilder<S> {
    const copy = new CommandContextBuilder<S>(this.source, this.rootNode, this.range.start);
    copy.command = this.command;
    for (const [name, argument] of this.arguments) {
      copy.arguments.set(name, argument);
    }
    copy.nodes.push(...this.nodes);
    copy.child = this.child;
    copy.range = this.range;
    copy.forks = this.forks;
    copy.modifier = this.modifier;
    return copy;
  }

  build(input: string): CommandContext<S> {
    return new CommandContext({
      source: this.source,
      input,
      arguments: new Map(this.arguments),
      command: this.command,
      rootNode: this.rootNode,
      nodes: [...this.nodes],
      range: this.range,
      child: this.child === null ? null : this.child.build(input),
      redirectModifier: this.modifier,
      forks: this.forks,
    });
  }

  /**
   * Locate the node whose children should be completed at `cursor`:
   * past the parsed range it is the last matched node (or the redirect
   * child's answer); inside it, the node preceding the token under the
   * cursor.
   */
  findSuggestionContext(cursor: number): SuggestionContext<S> {
    if (this.range.start > cursor) {
      throw new IllegalStateError("Can't find node before cursor");
    }
    if (this.range.end < cursor) {
      if (this.child !== null) {
        return this.child.findSuggestionContext(cursor);
      }
      const last = this.nodes[this.nodes.length - 1];
      if (last !== undefined) {
        return { parent: last.node, startPos: last.range.end + 1 };
      }
      return { parent: this.rootNode, startPos: this.range.start };
    }

    let prev = this.rootNode;
    for (const { node, range } of this.nodes) {
      if (range.start <= cursor && cursor <= range.end) {
        return { parent: prev, startPos: range.start };
      }
      prev = node;
    }
    return { parent: prev, startPos: this.range.start };
  }
}
