/**
 * @fileoverview Range checks shared by the numeric argument types
 */

import type { ParameterizedErrorType, StringReader } from '@trellis/core';

/**
 * Reject a value outside [minimum, maximum], putting the cursor back at the
 * start of the token so the error points at it
 */
export function checkBounds<T extends number | bigint>(
  reader: StringReader,
  start: number,
  value: T,
  minimum: T,
  maximum: T,
  tooLow: ParameterizedErrorType,
  tooHigh: ParameterizedErrorType
): T {
  if (value < minimum) {
    reader.setCursor(start);
    throw tooLow.createWithContext(reader, value, minimum);
  }
  if (value > maximum) {
    reader.setCursor(start);
    throw tooHigh.createWithContext(reader, value, maximum);
  }
  return value;
}

export function describeBounds<T extends number | bigint>(
  name: string,
  minimum: T,
  maximum: T,
  lowest: T,
  highest: T
): string {
  if (minimum === lowest && maximum === highest) {
    return `${name}()`;
  }
  if (maximum === highest) {
    return `${name}(${minimum})`;
  }
  return `${name}(${minimum}, ${maximum})`;
}
