/**
 * @fileoverview Builder exports
 */

export { ArgumentBuilder } from './argument-builder.js';
export { LiteralArgumentBuilder, literal } from './literal-builder.js';
export { RequiredArgumentBuilder, argument } from './required-argument-builder.js';
