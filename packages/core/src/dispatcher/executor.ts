/**
 * @fileoverview Executor
 *
 * Runs a parsed command line. Contexts are processed level by level: a
 * context that followed a redirect expands into one child context per
 * target source, and a context with a command runs it. Once a forking node
 * has been crossed, a failing branch is recorded and its siblings keep
 * running.
 */

import type { CommandContext } from '../context/command-context.js';
import { ForkedExecutionError, type BranchFailure } from '../errors/command-errors.js';
import { BuiltInErrors } from '../errors/built-in.js';
import type { CommandSyntaxError } from '../errors/syntax-error.js';
import type { TrellisLogger } from '../logging/logger.js';
import type { ResultConsumer } from '../tree/types.js';
import type { ParseResults } from './parse-results.js';

export interface ExecutionReport<S> {
  /** Success count when forked, otherwise the summed command results */
  result: number;
  successes: number;
  forked: boolean;
  failures: BranchFailure<CommandContext<S>>[];
  /** Aggregate of `failures`, null when every branch succeeded */
  error: ForkedExecutionError<CommandContext<S>> | null;
}

/**
 * The error to report for input the parser could not consume: the recorded
 * error that got furthest (the first one on ties), else a generic one.
 */
export function unparsedInputError<S>(parse: ParseResults<S>): CommandSyntaxError {
  let furthest: CommandSyntaxError | null = null;
  for (const error of parse.exceptions.values()) {
    if (furthest === null || error.cursor > furthest.cursor) {
      furthest = error;
    }
  }
  if (furthest !== null) {
    return furthest;
  }
  if (parse.context.getRange().isEmpty()) {
    return BuiltInErrors.dispatcherUnknownCommand.createWithContext(parse.reader);
  }
  return BuiltInErrors.dispatcherUnknownArgument.createWithContext(parse.reader);
}

export function executeParsed<S>(
  parse: ParseResults<S>,
  consumer: ResultConsumer<S>,
  logger: TrellisLogger
): ExecutionReport<S> {
  if (parse.reader.canRead()) {
    throw unparsedInputError(parse);
  }

  let result = 0;
  let successes = 0;
  let forked = false;
  let foundCommand = false;
  const failures: BranchFailure<CommandContext<S>>[] = [];

  const recordFailure = (context: CommandContext<S>, error: unknown): void => {
    consumer(context, false, 0);
    if (!forked) {
      throw error;
    }
    failures.push({ context, error });
    logger.warn('Forked branch failed', {
      input: context.input,
      err: error instanceof Error ? error : new Error(String(error)),
    });
  };

  const original = parse.context.build(parse.reader.getString());
  let contexts: CommandContext<S>[] = [original];

  while (contexts.length > 0) {
    const next: CommandContext<S>[] = [];

    for (const context of contexts) {
      const child = context.child;
      if (child !== null) {
        forked ||= context.isForked();
        if (!child.hasNodes()) {
          continue;
        }
        foundCommand = true;
        const modifier = context.redirectModifier;
        if (modifier === null) {
          next.push(child.copyFor(context.source));
          continue;
        }
        try {
          for (const source of modifier(context)) {
            next.push(child.copyFor(source));
          }
        } catch (error) {
          recordFailure(context, error);
        }
      } else if (context.command !== null) {
        foundCommand = true;
        try {
          const value = context.command(context);
          result += value;
          consumer(context, true, value);
          successes++;
        } catch (error) {
          recordFailure(context, error);
        }
      }
    }

    contexts = next;
  }

  if (!foundCommand) {
    consumer(original, false, 0);
    throw BuiltInErrors.dispatcherUnknownCommand.createWithContext(parse.reader);
  }

  return {
    result: forked ? successes : result,
    successes,
    forked,
    failures,
    error: failures.length > 0 ? new ForkedExecutionError(failures, successes) : null,
  };
}
