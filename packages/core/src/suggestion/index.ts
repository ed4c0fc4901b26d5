/**
 * @fileoverview Suggestion module exports
 */

export { Suggestion, IntegerSuggestion, compareStrings } from './suggestion.js';
export { Suggestions } from './suggestions.js';
export { SuggestionsBuilder } from './suggestions-builder.js';
