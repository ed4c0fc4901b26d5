/**
 * @fileoverview Command Node
 *
 * Shared state of every node in the command tree: owned children (in
 * insertion order), eligibility predicates, the execution callback and the
 * optional redirect. Variant behaviour (root, literal, argument) lives in the
 * subclasses; decisions that span variants branch on `kind`.
 */

import type { ArgumentBuilder } from '../builder/argument-builder.js';
import type { CommandContext } from '../context/command-context.js';
import type { CommandContextBuilder } from '../context/command-context-builder.js';
import { TreeStructureError } from '../errors/command-errors.js';
import type { ImmutableStringReader, StringReader } from '../reader/string-reader.js';
import { compareStrings } from '../suggestion/suggestion.js';
import type { Suggestions } from '../suggestion/suggestions.js';
import type { SuggestionsBuilder } from '../suggestion/suggestions-builder.js';
import type { Command, ContextRequirement, RedirectModifier, Requirement } from './types.js';

export type NodeKind = 'root' | 'literal' | 'argument';

export interface CommandNodeOptions<S> {
  command?: Command<S> | null;
  requirement?: Requirement<S>;
  contextRequirement?: ContextRequirement<S>;
  redirect?: CommandNode<S> | null;
  modifier?: RedirectModifier<S> | null;
  forks?: boolean;
}

/** Separator between tokens of a command line */
export const ARGUMENT_SEPARATOR = ' ';

export abstract class CommandNode<S> {
  abstract readonly kind: NodeKind;

  private readonly children = new Map<string, CommandNode<S>>();
  private readonly literals = new Map<string, CommandNode<S>>();
  private readonly arguments = new Map<string, CommandNode<S>>();
  private readonly requirement: Requirement<S>;
  private readonly contextRequirement: ContextRequirement<S>;
  private readonly redirect: CommandNode<S> | null;
  private readonly modifier: RedirectModifier<S> | null;
  private readonly forks: boolean;
  private command: Command<S> | null;

  protected constructor(options: CommandNodeOptions<S> = {}) {
    this.command = options.command ?? null;
    this.requirement = options.requirement ?? (() => true);
    this.contextRequirement = options.contextRequirement ?? (() => true);
    this.redirect = options.redirect ?? null;
    this.modifier = options.modifier ?? null;
    this.forks = options.forks ?? false;
  }

  getCommand(): Command<S> | null {
    return this.command;
  }

  getChildren(): CommandNode<S>[] {
    return [...this.children.values()];
  }

  getChild(name: string): CommandNode<S> | undefined {
    return this.children.get(name);
  }

  getRedirect(): CommandNode<S> | null {
    return this.redirect;
  }

  getRedirectModifier(): RedirectModifier<S> | null {
    return this.modifier;
  }

  isFork(): boolean {
    return this.forks;
  }

  getRequirement(): Requirement<S> {
    return this.requirement;
  }

  getContextRequirement(): ContextRequirement<S> {
    return this.contextRequirement;
  }

  canUse(source: S): boolean {
    return this.requirement(source);
  }

  canUseInContext(context: CommandContextBuilder<S>, reader: ImmutableStringReader): boolean {
    return this.contextRequirement(context, reader);
  }

  /**
   * Insert a child, or merge it into the existing child of the same name:
   * the incoming command wins only when set, and the incoming children are
   * added to the existing child recursively.
   */
  addChild(node: CommandNode<S>): void {
    if (node.kind === 'root') {
      throw new TreeStructureError('Cannot add a root node as a child to any other node');
    }

    const name = node.getName();
    const existing = this.children.get(name);
    if (existing !== undefined) {
      if (node.command !== null) {
        existing.command = node.command;
      }
      for (const grandchild of node.getChildren()) {
        existing.addChild(grandchild);
      }
      return;
    }

    this.children.set(name, node);
    if (node.kind === 'literal') {
      this.literals.set(name, node);
    } else {
      this.arguments.set(name, node);
    }
  }

  removeChildByName(name: string): void {
    if (this.children.delete(name)) {
      this.literals.delete(name);
      this.arguments.delete(name);
    }
  }

  /**
   * Children worth trying at the reader's cursor. A literal is only a
   * candidate when the next token equals it exactly, and then it comes
   * before every argument child.
   */
  getRelevantNodes(reader: ImmutableStringReader): CommandNode<S>[] {
    if (this.literals.size > 0) {
      const remaining = reader.getRemaining();
      const end = remaining.indexOf(ARGUMENT_SEPARATOR);
      const token = end === -1 ? remaining : remaining.substring(0, end);
      const literal = this.literals.get(token);
      if (literal !== undefined) {
        return [literal, ...this.arguments.values()];
      }
    }
    return [...this.arguments.values()];
  }

  /**
   * Literals first, then by sort key
   */
  compareTo(other: CommandNode<S>): number {
    if ((this.kind === 'literal') === (other.kind === 'literal')) {
      return compareStrings(this.getSortedKey(), other.getSortedKey());
    }
    return other.kind === 'literal' ? 1 : -1;
  }

  /**
   * Structural equality: same variant, name and command, and pairwise equal
   * children. Predicates and redirects are not compared.
   */
  equals(other: CommandNode<S>): boolean {
    if (this === other) {
      return true;
    }
    if (this.kind !== other.kind || this.getName() !== other.getName() || this.command !== other.command) {
      return false;
    }
    if (this.children.size !== other.children.size) {
      return false;
    }
    for (const [name, child] of this.children) {
      const match = other.children.get(name);
      if (match === undefined || !child.equals(match)) {
        return false;
      }
    }
    return this.sameVariant(other);
  }

  /** Variant-specific part of `equals` */
  protected sameVariant(_other: CommandNode<S>): boolean {
    return true;
  }

  abstract getName(): string;

  abstract getUsageText(): string;

  /**
   * Match this node at the reader's cursor and record it in the context.
   * Throws CommandSyntaxError when the input does not match.
   */
  abstract parse(reader: StringReader, context: CommandContextBuilder<S>): void;

  abstract listSuggestions(context: CommandContext<S>, builder: SuggestionsBuilder): Promise<Suggestions>;

  abstract isValidInput(input: string): boolean;

  abstract getExamples(): readonly string[];

  abstract createBuilder(): ArgumentBuilder<S>;

  protected abstract getSortedKey(): string;
}
