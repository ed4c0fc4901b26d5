/**
 * @fileoverview Suggestions Builder
 *
 * Collects completions for the token that starts at `start`. One builder is
 * created per candidate node and owned by that node's suggestion task.
 */

import { StringRange } from '../context/string-range.js';
import { IntegerSuggestion, Suggestion } from './suggestion.js';
import { Suggestions } from './suggestions.js';

export class SuggestionsBuilder {
  readonly inputLowerCase: string;
  readonly remaining: string;
  readonly remainingLowerCase: string;
  private result: Suggestion[] = [];

  constructor(
    readonly input: string,
    readonly start: number,
    inputLowerCase?: string,
    /** Aborted when the caller no longer wants the result */
    readonly signal?: AbortSignal
  ) {
    this.inputLowerCase = inputLowerCase ?? input.toLowerCase();
    this.remaining = input.substring(start);
    this.remainingLowerCase = this.inputLowerCase.substring(start);
  }

  build(): Suggestions {
    return Suggestions.create(this.input, this.result);
  }

  buildPromise(): Promise<Suggestions> {
    return Promise.resolve(this.build());
  }

  /**
   * Offer a completion for the current token. Text identical to what is
   * already typed is ignored.
   */
  suggest(text: string | number, tooltip: string | null = null): this {
    const range = StringRange.between(this.start, this.input.length);
    if (typeof text === 'number') {
      this.result.push(new IntegerSuggestion(range, text, tooltip));
      return this;
    }
    if (text === this.remaining) {
      return this;
    }
    this.result.push(new Suggestion(range, text, tooltip));
    return this;
  }

  add(other: SuggestionsBuilder): this {
    this.result.push(...other.result);
    return this;
  }

  createOffset(start: number): SuggestionsBuilder {
    return new SuggestionsBuilder(this.input, start, this.inputLowerCase, this.signal);
  }

  restart(): SuggestionsBuilder {
    return this.createOffset(this.start);
  }
}
