/**
 * @fileoverview Context module exports
 */

export { StringRange } from './string-range.js';
export { CommandContext, type CommandContextInit } from './command-context.js';
export { CommandContextBuilder } from './command-context-builder.js';
export type { ParsedArgument, ParsedCommandNode, SuggestionContext } from './types.js';
