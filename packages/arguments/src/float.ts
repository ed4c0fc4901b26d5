/**
 * @fileoverview Float Argument
 *
 * Decimal values rounded to single precision.
 */

import { BuiltInErrors, type ArgumentType, type CommandContext, type StringReader } from '@trellis/core';
import { checkBounds, describeBounds } from './bounds.js';
import { DOUBLE_EXAMPLES, isFiniteNumber } from './double.js';

/** Largest finite single-precision value */
export const FLOAT_MAX = 3.4028234663852886e38;

/**
 * Single-precision number; parsed values are rounded with Math.fround
 */
export class FloatArgumentType implements ArgumentType<number> {
  constructor(
    readonly minimum: number = -FLOAT_MAX,
    readonly maximum: number = FLOAT_MAX
  ) {}

  parse(reader: StringReader): number {
    const start = reader.getCursor();
    const result = reader.readFloat();
    return checkBounds(
      reader,
      start,
      result,
      this.minimum,
      this.maximum,
      BuiltInErrors.floatTooLow,
      BuiltInErrors.floatTooHigh
    );
  }

  getExamples(): readonly string[] {
    return DOUBLE_EXAMPLES;
  }

  equals(other: unknown): boolean {
    return other instanceof FloatArgumentType && other.minimum === this.minimum && other.maximum === this.maximum;
  }

  toString(): string {
    return describeBounds('float', this.minimum, this.maximum, -FLOAT_MAX, FLOAT_MAX);
  }
}

export function float(min?: number, max?: number): FloatArgumentType {
  return new FloatArgumentType(min, max);
}

export function getFloat<S>(context: CommandContext<S>, name: string): number {
  return context.getArgumentAs(name, isFiniteNumber, 'number');
}
