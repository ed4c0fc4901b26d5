/**
 * @fileoverview Completion
 *
 * Asks every usable child of the node before the cursor for suggestions,
 * concurrently, and merges the answers into one sorted list.
 */

import { SuggestionsAbortedError } from '../errors/command-errors.js';
import { isCommandSyntaxError } from '../errors/syntax-error.js';
import type { TrellisLogger } from '../logging/logger.js';
import { Suggestions } from '../suggestion/suggestions.js';
import { SuggestionsBuilder } from '../suggestion/suggestions-builder.js';
import type { ParseResults } from './parse-results.js';

export interface CompletionOptions {
  /** Cursor position in the input; defaults to the end of the input */
  cursor?: number;
  /** Rejects the request with SuggestionsAbortedError once aborted */
  signal?: AbortSignal;
}

export async function getCompletionSuggestions<S>(
  parse: ParseResults<S>,
  cursor: number,
  logger: TrellisLogger,
  signal?: AbortSignal
): Promise<Suggestions> {
  const context = parse.context;
  const { parent, startPos } = context.findSuggestionContext(cursor);
  const start = Math.min(startPos, cursor);

  const fullInput = parse.reader.getString();
  const truncatedInput = fullInput.substring(0, cursor);
  const truncatedInputLowerCase = truncatedInput.toLowerCase();
  const built = context.build(truncatedInput);
  const source = context.getSource();

  const tasks = parent
    .getChildren()
    .filter((node) => node.canUse(source))
    .map(async (node) => {
      const builder = new SuggestionsBuilder(truncatedInput, start, truncatedInputLowerCase, signal);
      try {
        return await node.listSuggestions(built, builder);
      } catch (error) {
        if (!isCommandSyntaxError(error)) {
          throw error;
        }
        logger.debug('Suggestion provider rejected input', { node: node.getName(), error: error.message });
        return Suggestions.EMPTY;
      }
    });

  const results = await abortable(Promise.all(tasks), signal);
  return Suggestions.merge(fullInput, results);
}

/**
 * Settle with `task`, or reject with SuggestionsAbortedError as soon as
 * `signal` aborts
 */
export function abortable<T>(task: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (signal === undefined) {
    return task;
  }
  if (signal.aborted) {
    // Outcome ignored once aborted
    void task.catch(() => undefined);
    return Promise.reject(new SuggestionsAbortedError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new SuggestionsAbortedError(signal.reason));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    void task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
