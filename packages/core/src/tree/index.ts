/**
 * @fileoverview Command tree exports
 */

export {
  CommandNode,
  ARGUMENT_SEPARATOR,
  type NodeKind,
  type CommandNodeOptions,
} from './command-node.js';
export { RootCommandNode } from './root-node.js';
export { LiteralCommandNode } from './literal-node.js';
export { ArgumentCommandNode, type ArgumentNodeOptions } from './argument-node.js';
export { findAmbiguities, collectAmbiguities, type Ambiguity } from './ambiguity.js';
export * from './types.js';
