/**
 * @fileoverview Main entry point for @trellis/core
 *
 * Trellis Core: command tree, parser, executor, completion and usage.
 */

export * from './errors/index.js';
export * from './reader/index.js';
export * from './context/index.js';
export * from './suggestion/index.js';
export * from './tree/index.js';
export * from './builder/index.js';
export * from './dispatcher/index.js';
export * from './settings/index.js';
export * from './logging/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'trellis';
