/**
 * @fileoverview Suggestions
 *
 * A ranked set of completions sharing one replacement range.
 */

import { StringRange } from '../context/string-range.js';
import type { Suggestion } from './suggestion.js';

function rank(a: Suggestion, b: Suggestion): number {
  const result = a.compareToIgnoreCase(b);
  return result !== 0 ? result : a.compareTo(b);
}

export class Suggestions {
  static readonly EMPTY = new Suggestions(StringRange.at(0), []);

  constructor(
    readonly range: StringRange,
    readonly list: readonly Suggestion[]
  ) {}

  static empty(): Promise<Suggestions> {
    return Promise.resolve(Suggestions.EMPTY);
  }

  isEmpty(): boolean {
    return this.list.length === 0;
  }

  /**
   * Merge results gathered from several nodes. Ordering depends only on
   * the suggestions themselves, never on the order the inputs arrived in.
   */
  static merge(command: string, input: readonly Suggestions[]): Suggestions {
    if (input.length === 0) {
      return Suggestions.EMPTY;
    }
    const [only] = input;
    if (input.length === 1 && only !== undefined) {
      return only;
    }
    return Suggestions.create(
      command,
      input.flatMap((suggestions) => suggestions.list)
    );
  }

  /**
   * Widen every suggestion to the union of their ranges, drop repeated
   * texts (first one wins), and sort.
   */
  static create(command: string, suggestions: readonly Suggestion[]): Suggestions {
    if (suggestions.length === 0) {
      return Suggestions.EMPTY;
    }
    let start = Number.MAX_SAFE_INTEGER;
    let end = Number.MIN_SAFE_INTEGER;
    for (const suggestion of suggestions) {
      start = Math.min(suggestion.range.start, start);
      end = Math.max(suggestion.range.end, end);
    }
    const range = new StringRange(start, end);
    const byText = new Map<string, Suggestion>();
    for (const suggestion of suggestions) {
      const expanded = suggestion.expand(command, range);
      if (!byText.has(expanded.text)) {
        byText.set(expanded.text, expanded);
      }
    }
    return new Suggestions(range, [...byText.values()].sort(rank));
  }

  toString(): string {
    return `Suggestions{range=${this.range.toString()}, suggestions=[${this.list
      .map((suggestion) => suggestion.toString())
      .join(', ')}]}`;
  }
}
