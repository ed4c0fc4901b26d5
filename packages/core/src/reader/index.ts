/**
 * @fileoverview Reader exports
 */

export { StringReader, type ImmutableStringReader } from './string-reader.js';
