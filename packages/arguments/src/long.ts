/**
 * @fileoverview Long Argument
 *
 * 64-bit signed whole numbers, carried as bigint.
 */

import { BuiltInErrors, type ArgumentType, type CommandContext, type StringReader } from '@trellis/core';
import { checkBounds, describeBounds } from './bounds.js';

export const LONG_MIN = -(2n ** 63n);
export const LONG_MAX = 2n ** 63n - 1n;

const EXAMPLES = ['0', '123', '-123'] as const;

/**
 * 64-bit signed integer, carried as a bigint
 */
export class LongArgumentType implements ArgumentType<bigint> {
  constructor(
    readonly minimum: bigint = LONG_MIN,
    readonly maximum: bigint = LONG_MAX
  ) {}

  parse(reader: StringReader): bigint {
    const start = reader.getCursor();
    const result = reader.readLong();
    return checkBounds(
      reader,
      start,
      result,
      this.minimum,
      this.maximum,
      BuiltInErrors.longTooLow,
      BuiltInErrors.longTooHigh
    );
  }

  getExamples(): readonly string[] {
    return EXAMPLES;
  }

  equals(other: unknown): boolean {
    return other instanceof LongArgumentType && other.minimum === this.minimum && other.maximum === this.maximum;
  }

  toString(): string {
    return describeBounds('long', this.minimum, this.maximum, LONG_MIN, LONG_MAX);
  }
}

export function long(min?: bigint, max?: bigint): LongArgumentType {
  return new LongArgumentType(min, max);
}

export function getLong<S>(context: CommandContext<S>, name: string): bigint {
  return context.getArgumentAs(name, (value): value is bigint => typeof value === 'bigint', 'bigint');
}
