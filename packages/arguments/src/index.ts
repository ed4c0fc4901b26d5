/**
 * @fileoverview Main entry point for @trellis/arguments
 *
 * Stock argument types for @trellis/core command trees, with typed getters
 * for the values they bind.
 */

export { BoolArgumentType, bool, getBool } from './bool.js';
export { IntegerArgumentType, integer, getInteger, INTEGER_MIN, INTEGER_MAX } from './integer.js';
export { LongArgumentType, long, getLong, LONG_MIN, LONG_MAX } from './long.js';
export { FloatArgumentType, float, getFloat, FLOAT_MAX } from './float.js';
export { DoubleArgumentType, double, getDouble } from './double.js';
export {
  StringArgumentType,
  word,
  string,
  greedyString,
  getString,
  escapeIfRequired,
  type StringType,
} from './string.js';
