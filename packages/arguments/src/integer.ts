/**
 * @fileoverview Integer Argument
 *
 * 32-bit signed whole numbers with optional bounds.
 */

import { BuiltInErrors, type ArgumentType, type CommandContext, type StringReader } from '@trellis/core';
import { checkBounds, describeBounds } from './bounds.js';

export const INTEGER_MIN = -2147483648;
export const INTEGER_MAX = 2147483647;

const EXAMPLES = ['0', '123', '-123'] as const;

/**
 * 32-bit signed integer, optionally bounded
 */
export class IntegerArgumentType implements ArgumentType<number> {
  constructor(
    readonly minimum: number = INTEGER_MIN,
    readonly maximum: number = INTEGER_MAX
  ) {}

  parse(reader: StringReader): number {
    const start = reader.getCursor();
    const result = reader.readInt();
    return checkBounds(
      reader,
      start,
      result,
      this.minimum,
      this.maximum,
      BuiltInErrors.integerTooLow,
      BuiltInErrors.integerTooHigh
    );
  }

  getExamples(): readonly string[] {
    return EXAMPLES;
  }

  equals(other: unknown): boolean {
    return other instanceof IntegerArgumentType && other.minimum === this.minimum && other.maximum === this.maximum;
  }

  toString(): string {
    return describeBounds('integer', this.minimum, this.maximum, INTEGER_MIN, INTEGER_MAX);
  }
}

export function integer(min?: number, max?: number): IntegerArgumentType {
  return new IntegerArgumentType(min, max);
}

export function getInteger<S>(context: CommandContext<S>, name: string): number {
  return context.getArgumentAs(name, isInteger, 'integer');
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}
