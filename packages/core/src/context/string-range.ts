/**
 * @fileoverview String Range
 */

import type { ImmutableStringReader } from '../reader/string-reader.js';

/**
 * Half-open span `[start, end)` of the input
 */
export class StringRange {
  constructor(
    readonly start: number,
    readonly end: number
  ) {}

  static at(pos: number): StringRange {
    return new StringRange(pos, pos);
  }

  static between(start: number, end: number): StringRange {
    return new StringRange(start, end);
  }

  static encompassing(a: StringRange, b: StringRange): StringRange {
    return new StringRange(Math.min(a.start, b.start), Math.max(a.end, b.end));
  }

  get(input: string | ImmutableStringReader): string {
    const text = typeof input === 'string' ? input : input.getString();
    return text.substring(this.start, this.end);
  }

  isEmpty(): boolean {
    return this.start === this.end;
  }

  get length(): number {
    return this.end - this.start;
  }

  equals(other: StringRange): boolean {
    return this.start === other.start && this.end === other.end;
  }

  toString(): string {
    return `StringRange{start=${this.start}, end=${this.end}}`;
  }
}
