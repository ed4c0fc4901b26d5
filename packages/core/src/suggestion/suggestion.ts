/**
 * @fileoverview Suggestion
 *
 * One completion: replacement text for a range of the input.
 */

import type { StringRange } from '../context/string-range.js';

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class Suggestion {
  constructor(
    readonly range: StringRange,
    readonly text: string,
    readonly tooltip: string | null = null
  ) {}

  /**
   * Input with this suggestion's range replaced by its text
   */
  apply(input: string): string {
    if (this.range.start === 0 && this.range.end === input.length) {
      return this.text;
    }
    return input.substring(0, this.range.start) + this.text + input.substring(this.range.end);
  }

  /**
   * Same suggestion over a wider range, filled in from the input
   */
  expand(command: string, range: StringRange): Suggestion {
    if (range.equals(this.range)) {
      return this;
    }
    let text = this.text;
    if (range.start < this.range.start) {
      text = command.substring(range.start, this.range.start) + text;
    }
    if (range.end > this.range.end) {
      text = text + command.substring(this.range.end, range.end);
    }
    return this.withRange(range, text);
  }

  protected withRange(range: StringRange, text: string): Suggestion {
    return new Suggestion(range, text, this.tooltip);
  }

  compareTo(other: Suggestion): number {
    return compareStrings(this.text, other.text);
  }

  compareToIgnoreCase(other: Suggestion): number {
    return compareStrings(this.text.toLowerCase(), other.text.toLowerCase());
  }

  equals(other: Suggestion): boolean {
    return this.range.equals(other.range) && this.text === other.text && this.tooltip === other.tooltip;
  }

  toString(): string {
    return `Suggestion{range=${this.range.toString()}, text='${this.text}', tooltip='${this.tooltip ?? ''}'}`;
  }
}

/**
 * Numeric suggestion. Orders numerically against other numeric suggestions.
 */
export class IntegerSuggestion extends Suggestion {
  constructor(
    range: StringRange,
    readonly value: number,
    tooltip: string | null = null
  ) {
    super(range, String(value), tooltip);
  }

  protected override withRange(range: StringRange, text: string): Suggestion {
    return text === this.text
      ? new IntegerSuggestion(range, this.value, this.tooltip)
      : new Suggestion(range, text, this.tooltip);
  }

  override compareTo(other: Suggestion): number {
    if (other instanceof IntegerSuggestion) {
      return Math.sign(this.value - other.value);
    }
    return super.compareTo(other);
  }

  override compareToIgnoreCase(other: Suggestion): number {
    if (other instanceof IntegerSuggestion) {
      return Math.sign(this.value - other.value);
    }
    return super.compareToIgnoreCase(other);
  }
}
