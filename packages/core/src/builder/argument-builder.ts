/**
 * @fileoverview Argument Builder
 *
 * Fluent construction of command nodes. Children added through then() are
 * collected under a scratch root so same-named subtrees merge exactly as
 * they do on a live tree.
 */

import { TreeStructureError } from '../errors/command-errors.js';
import type { CommandNode, CommandNodeOptions } from '../tree/command-node.js';
import { RootCommandNode } from '../tree/root-node.js';
import type {
  Command,
  ContextRequirement,
  RedirectModifier,
  Requirement,
  SingleRedirectModifier,
} from '../tree/types.js';

export abstract class ArgumentBuilder<S> {
  private readonly arguments = new RootCommandNode<S>();
  private command: Command<S> | null = null;
  private requirement: Requirement<S> = () => true;
  private contextRequirement: ContextRequirement<S> = () => true;
  private target: CommandNode<S> | null = null;
  private modifier: RedirectModifier<S> | null = null;
  private forks = false;

  then(argument: ArgumentBuilder<S> | CommandNode<S>): this {
    if (this.target !== null) {
      throw new TreeStructureError('Cannot add children to a redirected node');
    }
    this.arguments.addChild(argument instanceof ArgumentBuilder ? argument.build() : argument);
    return this;
  }

  getArguments(): CommandNode<S>[] {
    return this.arguments.getChildren();
  }

  executes(command: Command<S> | null): this {
    this.command = command;
    return this;
  }

  getCommand(): Command<S> | null {
    return this.command;
  }

  requires(requirement: Requirement<S>): this {
    this.requirement = requirement;
    return this;
  }

  getRequirement(): Requirement<S> {
    return this.requirement;
  }

  requiresInContext(requirement: ContextRequirement<S>): this {
    this.contextRequirement = requirement;
    return this;
  }

  getContextRequirement(): ContextRequirement<S> {
    return this.contextRequirement;
  }

  /**
   * Continue execution at `target`, optionally for a different source
   */
  redirect(target: CommandNode<S>, modifier: SingleRedirectModifier<S> | null = null): this {
    return this.forward(
      target,
      modifier === null ? null : (context) => [modifier(context)],
      false
    );
  }

  /**
   * Continue execution at `target` once per source the modifier returns,
   * isolating failures per branch
   */
  fork(target: CommandNode<S>, modifier: RedirectModifier<S>): this {
    return this.forward(target, modifier, true);
  }

  forward(target: CommandNode<S> | null, modifier: RedirectModifier<S> | null, fork: boolean): this {
    if (this.arguments.getChildren().length > 0) {
      throw new TreeStructureError('Cannot forward a node with children');
    }
    this.target = target;
    this.modifier = modifier;
    this.forks = fork;
    return this;
  }

  getRedirect(): CommandNode<S> | null {
    return this.target;
  }

  getRedirectModifier(): RedirectModifier<S> | null {
    return this.modifier;
  }

  isFork(): boolean {
    return this.forks;
  }

  protected nodeOptions(): CommandNodeOptions<S> {
    return {
      command: this.command,
      requirement: this.requirement,
      contextRequirement: this.contextRequirement,
      redirect: this.target,
      modifier: this.modifier,
      forks: this.forks,
    };
  }

  protected attachArguments<N extends CommandNode<S>>(node: N): N {
    for (const argument of this.getArguments()) {
      node.addChild(argument);
    }
    return node;
  }

  abstract build(): CommandNode<S>;
}
