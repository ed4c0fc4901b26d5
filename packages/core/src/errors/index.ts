/**
 * @fileoverview Errors module exports
 */

export * from './command-errors.js';
export * from './syntax-error.js';
export { BuiltInErrors } from './built-in.js';
