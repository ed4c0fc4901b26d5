/**
 * @fileoverview Command Context
 *
 * Immutable result of a parse, handed to commands, redirect modifiers and
 * suggestion providers.
 */

import { ArgumentLookupError } from '../errors/command-errors.js';
import type { CommandNode } from '../tree/command-node.js';
import type { Command, RedirectModifier } from '../tree/types.js';
import type { StringRange } from './string-range.js';
import type { ParsedArgument, ParsedCommandNode } from './types.js';

export interface CommandContextInit<S> {
  source: S;
  input: string;
  arguments: ReadonlyMap<string, ParsedArgument<unknown>>;
  command: Command<S> | null;
  rootNode: CommandNode<S>;
  nodes: readonly ParsedCommandNode<S>[];
  range: StringRange;
  child: CommandContext<S> | null;
  redirectModifier: RedirectModifier<S> | null;
  forks: boolean;
}

export class CommandContext<S> {
  readonly source: S;
  readonly input: string;
  readonly command: Command<S> | null;
  readonly rootNode: CommandNode<S>;
  readonly nodes: readonly ParsedCommandNode<S>[];
  readonly range: StringRange;
  readonly child: CommandContext<S> | null;
  readonly redirectModifier: RedirectModifier<S> | null;
  readonly forks: boolean;
  private readonly arguments: ReadonlyMap<string, ParsedArgument<unknown>>;

  constructor(init: CommandContextInit<S>) {
    this.source = init.source;
    this.input = init.input;
    this.arguments = init.arguments;
    this.command = init.command;
    this.rootNode = init.rootNode;
    this.nodes = init.nodes;
    this.range = init.range;
    this.child = init.child;
    this.redirectModifier = init.redirectModifier;
    this.forks = init.forks;
  }

  /**
   * Same context for another source. Used when a redirect fans out.
   */
  copyFor(source: S): CommandContext<S> {
    if (this.source === source) {
      return this;
    }
    return new CommandContext({
      source,
      input: this.input,
      arguments: this.arguments,
      command: this.command,
      rootNode: this.rootNode,
      nodes: this.nodes,
      range: this.range,
      child: this.child,
      redirectModifier: this.redirectModifier,
      forks: this.forks,
    });
  }

  getLastChild(): CommandContext<S> {
    let result: CommandContext<S> = this;
    while (result.child !== null) {
      result = result.child;
    }
    return result;
  }

  hasNodes(): boolean {
    return this.nodes.length > 0;
  }

  isForked(): boolean {
    return this.forks;
  }

  hasArgument(name: string): boolean {
    return this.arguments.has(name);
  }

  /**
   * Value bound to an argument name
   */
  getArgument(name: string): unknown {
    const argument = this.arguments.get(name);
    if (argument === undefined) {
      throw new ArgumentLookupError(`No such argument '${name}' exists on this command`);
    }
    return argument.result;
  }

  /**
   * Value bound to an argument name, checked against the expected type
   */
  getArgumentAs<T>(name: string, guard: (value: unknown) => value is T, typeName: string): T {
    const value = this.getArgument(name);
    if (!guard(value)) {
      throw new ArgumentLookupError(
        `Argument '${name}' is defined as ${describe(value)}, not ${typeName}`
      );
    }
    return value;
  }
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
