/**
 * @fileoverview Suggestion Tests
 */
import { describe, it, expect } from 'vitest';
import { StringRange } from '../../src/context/string-range.js';
import { IntegerSuggestion, Suggestion } from '../../src/suggestion/suggestion.js';
import { Suggestions } from '../../src/suggestion/suggestions.js';

describe('Suggestion', () => {
  it('should insert at the start', () => {
    const suggestion = new Suggestion(StringRange.at(0), 'And so I said: ');

    expect(suggestion.apply('Hello world!')).toBe('And so I said: Hello world!');
  });

  it('should replace its range', () => {
    const suggestion = new Suggestion(StringRange.between(6, 11), 'everyone');

    expect(suggestion.apply('Hello world!')).toBe('Hello everyone!');
  });

  it('should replace the whole input', () => {
    expect(new Suggestion(StringRange.between(0, 5), 'bye').apply('hello')).toBe('bye');
  });

  it('should expand to a wider range using the input', () => {
    const suggestion = new Suggestion(StringRange.at(1), 'oo');
    const expanded = suggestion.expand('f', StringRange.between(0, 1));

    expect(expanded.text).toBe('foo');
    expect(expanded.range).toEqual(new StringRange(0, 1));
  });

  it('should expand on both sides', () => {
    const suggestion = new Suggestion(StringRange.between(4, 5), 'X');
    const expanded = suggestion.expand('abcdefgh', StringRange.between(2, 7));

    expect(expanded.text).toBe('cdXfg');
  });
});

describe('Suggestions', () => {
  it('should sort case-insensitively with case as the tie-break', () => {
    const range = StringRange.between(4, 5);
    const suggestions = Suggestions.create('foo b', [
      new Suggestion(range, 'baz'),
      new Suggestion(range, 'bar'),
      new Suggestion(range, 'Bar'),
    ]);

    expect(suggestions.list.map((s) => s.text)).toEqual(['Bar', 'bar', 'baz']);
  });

  it('should keep the first suggestion of each text', () => {
    const range = StringRange.between(4, 5);
    const suggestions = Suggestions.create('foo b', [
      new Suggestion(range, 'bar', 'first'),
      new Suggestion(range, 'bar', 'second'),
    ]);

    expect(suggestions.list).toHaveLength(1);
    expect(suggestions.list[0]?.tooltip).toBe('first');
  });

  it('should order numeric suggestions by value', () => {
    const range = StringRange.at(0);
    const suggestions = Suggestions.create('', [
      new IntegerSuggestion(range, 10),
      new IntegerSuggestion(range, 2),
      new IntegerSuggestion(range, 1),
    ]);

    expect(suggestions.list.map((s) => s.text)).toEqual(['1', '2', '10']);
  });

  it('should widen merged suggestions to a common range', () => {
    const merged = Suggestions.merge('foo b', [
      new Suggestions(StringRange.between(4, 5), [new Suggestion(StringRange.between(4, 5), 'bar')]),
      new Suggestions(StringRange.at(5), [new Suggestion(StringRange.at(5), 'ar')]),
    ]);

    expect(merged.range).toEqual(new StringRange(4, 5));
    expect(merged.list.map((s) => s.text)).toEqual(['bar']);
  });

  it('should merge nothing into the empty result', () => {
    expect(Suggestions.merge('foo', []).isEmpty()).toBe(true);
  });
});
