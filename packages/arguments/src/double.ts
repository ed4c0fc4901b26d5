/**
 * @fileoverview Double Argument
 */

import { BuiltInErrors, type ArgumentType, type CommandContext, type StringReader } from '@trellis/core';
import { checkBounds, describeBounds } from './bounds.js';

export const DOUBLE_EXAMPLES = ['0', '1.2', '.5', '-1', '-.5', '-1234.56'] as const;

export class DoubleArgumentType implements ArgumentType<number> {
  constructor(
    readonly minimum: number = -Number.MAX_VALUE,
    readonly maximum: number = Number.MAX_VALUE
  ) {}

  parse(reader: StringReader): number {
    const start = reader.getCursor();
    const result = reader.readDouble();
    return checkBounds(
      reader,
      start,
      result,
      this.minimum,
      this.maximum,
      BuiltInErrors.doubleTooLow,
      BuiltInErrors.doubleTooHigh
    );
  }

  getExamples(): readonly string[] {
    return DOUBLE_EXAMPLES;
  }

  equals(other: unknown): boolean {
    return other instanceof DoubleArgumentType && other.minimum === this.minimum && other.maximum === this.maximum;
  }

  toString(): string {
    return describeBounds('double', this.minimum, this.maximum, -Number.MAX_VALUE, Number.MAX_VALUE);
  }
}

export function double(min?: number, max?: number): DoubleArgumentType {
  return new DoubleArgumentType(min, max);
}

export function getDouble<S>(context: CommandContext<S>, name: string): number {
  return context.getArgumentAs(name, isFiniteNumber, 'number');
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
