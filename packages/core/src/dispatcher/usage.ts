/**
 * @fileoverview Usage
 *
 * Human-readable usage strings for a subtree, either one line per
 * executable path or one compact line per child.
 */

import type { UsageSettings } from '../settings/types.js';
import type { CommandNode } from '../tree/command-node.js';

export class UsageFormatter<S> {
  constructor(
    private readonly root: CommandNode<S>,
    private readonly tokens: UsageSettings
  ) {}

  /**
   * Every executable path below `node`, e.g. `teleport <target>`.
   * When restricted, subtrees the source cannot use are skipped.
   */
  getAllUsage(node: CommandNode<S>, source: S, restricted: boolean): string[] {
    const result: string[] = [];
    this.collectAllUsage(node, source, result, '', restricted);
    return result;
  }

  /**
   * One line per usable child, with optional parts in brackets and
   * alternatives grouped
   */
  getSmartUsage(node: CommandNode<S>, source: S): Map<CommandNode<S>, string> {
    const result = new Map<CommandNode<S>, string>();
    const optional = node.getCommand() !== null;
    for (const child of node.getChildren()) {
      const usage = this.smartUsage(child, source, optional, false);
      if (usage !== null) {
        result.set(child, usage);
      }
    }
    return result;
  }

  private collectAllUsage(
    node: CommandNode<S>,
    source: S,
    result: string[],
    prefix: string,
    restricted: boolean
  ): void {
    if (restricted && !node.canUse(source)) {
      return;
    }
    if (node.getCommand() !== null) {
      result.push(prefix);
    }

    const redirect = node.getRedirect();
    if (redirect !== null) {
      const target = this.redirectText(redirect);
      result.push(prefix === '' ? `${node.getUsageText()} ${target}` : `${prefix} ${target}`);
      return;
    }
    for (const child of node.getChildren()) {
      const usage = prefix === '' ? child.getUsageText() : `${prefix} ${child.getUsageText()}`;
      this.collectAllUsage(child, source, result, usage, restricted);
    }
  }

  private smartUsage(node: CommandNode<S>, source: S, optional: boolean, deep: boolean): string | null {
    if (!node.canUse(source)) {
      return null;
    }

    const { optionalOpen, optionalClose, requiredOpen, requiredClose, or } = this.tokens;
    const self = optional ? `${optionalOpen}${node.getUsageText()}${optionalClose}` : node.getUsageText();
    if (deep) {
      return self;
    }

    const redirect = node.getRedirect();
    if (redirect !== null) {
      return `${self} ${this.redirectText(redirect)}`;
    }

    const childOptional = node.getCommand() !== null;
    const open = childOptional ? optionalOpen : requiredOpen;
    const close = childOptional ? optionalClose : requiredClose;
    const children = node.getChildren().filter((child) => child.canUse(source));

    const [only] = children;
    if (children.length === 1 && only !== undefined) {
      const usage = this.smartUsage(only, source, childOptional, childOptional);
      if (usage !== null) {
        return `${self} ${usage}`;
      }
    } else if (children.length > 1) {
      const childUsage = new Set<string>();
      for (const child of children) {
        const usage = this.smartUsage(child, source, childOptional, true);
        if (usage !== null) {
          childUsage.add(usage);
        }
      }
      const [single] = childUsage;
      if (childUsage.size === 1 && single !== undefined) {
        return `${self} ${childOptional ? `${optionalOpen}${single}${optionalClose}` : single}`;
      }
      if (childUsage.size > 1) {
        const alternatives = children.map((child) => child.getUsageText()).join(or);
        return `${self} ${open}${alternatives}${close}`;
      }
    }

    return self;
  }

  private redirectText(redirect: CommandNode<S>): string {
    return redirect === this.root
      ? this.tokens.redirectToRoot
      : `${this.tokens.redirectPrefix}${redirect.getUsageText()}`;
  }
}
