/**
 * @fileoverview Command Tree Types
 *
 * Capability contracts the tree calls through: execution callbacks,
 * eligibility predicates, redirect modifiers, argument types and
 * suggestion providers.
 */

import type { CommandContext } from '../context/command-context.js';
import type { CommandContextBuilder } from '../context/command-context-builder.js';
import type { ImmutableStringReader, StringReader } from '../reader/string-reader.js';
import type { Suggestions } from '../suggestion/suggestions.js';
import type { SuggestionsBuilder } from '../suggestion/suggestions-builder.js';
import type { CommandNode } from './command-node.js';

/** Conventional result of a command that simply succeeded */
export const SINGLE_SUCCESS = 1;

/**
 * Execution callback. Returns an integer outcome, throws on failure.
 */
export type Command<S> = (context: CommandContext<S>) => number;

/**
 * Whether a source (caller identity) may use a node
 */
export type Requirement<S> = (source: S) => boolean;

/**
 * Whether a node may be tried given the parse so far
 */
export type ContextRequirement<S> = (
  context: CommandContextBuilder<S>,
  reader: ImmutableStringReader
) => boolean;

/**
 * Maps the source of a redirecting context to the sources the redirect
 * target runs for. An empty result runs nothing.
 */
export type RedirectModifier<S> = (context: CommandContext<S>) => readonly S[];

export type SingleRedirectModifier<S> = (context: CommandContext<S>) => S;

/**
 * Observes every command completion during execution
 */
export type ResultConsumer<S> = (context: CommandContext<S>, success: boolean, result: number) => void;

/**
 * Receives ambiguity findings: `child` declares examples that `sibling`
 * also accepts.
 */
export type AmbiguityConsumer<S> = (
  parent: CommandNode<S>,
  child: CommandNode<S>,
  sibling: CommandNode<S>,
  inputs: ReadonlySet<string>
) => void;

export type SuggestionProvider<S> = (
  context: CommandContext<S>,
  builder: SuggestionsBuilder
) => Promise<Suggestions>;

/**
 * Pluggable argument-value parser
 */
export interface ArgumentType<T> {
  /**
   * Parse a value at the reader's cursor, leaving the cursor after it.
   * Throws CommandSyntaxError when the input does not match.
   */
  parse<S>(reader: StringReader, context?: CommandContextBuilder<S>): T;

  listSuggestions?<S>(context: CommandContext<S>, builder: SuggestionsBuilder): Promise<Suggestions>;

  /** Sample inputs, used by ambiguity analysis */
  getExamples?(): readonly string[];

  /** Value equality with another type, used when comparing trees */
  equals?(other: unknown): boolean;
}
