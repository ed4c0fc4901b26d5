/**
 * @fileoverview Ambiguity Analyzer
 *
 * Design-time diagnostic: finds siblings where one accepts the declared
 * examples of the other. Quadratic in the number of children, so keep it
 * off the request path.
 */

import type { CommandNode } from './command-node.js';
import type { AmbiguityConsumer } from './types.js';

export interface Ambiguity<S> {
  parent: CommandNode<S>;
  child: CommandNode<S>;
  sibling: CommandNode<S>;
  inputs: ReadonlySet<string>;
}

/**
 * Report every (child, sibling) pair below `node` where the sibling accepts
 * one of the child's examples, then descend into each child.
 */
export function findAmbiguities<S>(node: CommandNode<S>, consumer: AmbiguityConsumer<S>): void {
  const children = node.getChildren();

  for (const child of children) {
    for (const sibling of children) {
      if (child === sibling) {
        continue;
      }

      const matches = new Set<string>();
      for (const input of child.getExamples()) {
        if (sibling.isValidInput(input)) {
          matches.add(input);
        }
      }

      if (matches.size > 0) {
        consumer(node, child, sibling, matches);
      }
    }

    findAmbiguities(child, consumer);
  }
}

export function collectAmbiguities<S>(node: CommandNode<S>): Ambiguity<S>[] {
  const result: Ambiguity<S>[] = [];
  findAmbiguities(node, (parent, child, sibling, inputs) => {
    result.push({ parent, child, sibling, inputs });
  });
  return result;
}
