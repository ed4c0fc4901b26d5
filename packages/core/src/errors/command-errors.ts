/**
 * @fileoverview Command Error Types
 *
 * Typed error hierarchy for the command tree. Callers branch on `code`
 * or on the subclass instead of matching message text.
 */

/**
 * Centralized command error codes
 */
export const CommandErrorCode = {
  SYNTAX: 'SYNTAX',
  TREE_STRUCTURE: 'TREE_STRUCTURE',
  FORKED_EXECUTION: 'FORKED_EXECUTION',
  ARGUMENT_LOOKUP: 'ARGUMENT_LOOKUP',
  ILLEGAL_STATE: 'ILLEGAL_STATE',
  SUGGESTIONS_ABORTED: 'SUGGESTIONS_ABORTED',
} as const;

export type CommandErrorCodeType = (typeof CommandErrorCode)[keyof typeof CommandErrorCode];

/**
 * Base command error class
 */
export class CommandError extends Error {
  override readonly name: string = 'CommandError';

  constructor(
    public readonly code: CommandErrorCodeType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Invalid tree construction, such as adding a root node as a child.
 * Never recovered from.
 */
export class TreeStructureError extends CommandError {
  override readonly name: string = 'TreeStructureError';

  constructor(message: string) {
    super(CommandErrorCode.TREE_STRUCTURE, message);
  }
}

/**
 * Argument requested from a context that either was never bound
 * or holds a value of another type.
 */
export class ArgumentLookupError extends CommandError {
  override readonly name: string = 'ArgumentLookupError';

  constructor(message: string) {
    super(CommandErrorCode.ARGUMENT_LOOKUP, message);
  }
}

/**
 * Raised when the tree or a context reaches a state it should never be in
 */
export class IllegalStateError extends CommandError {
  override readonly name: string = 'IllegalStateError';

  constructor(message: string) {
    super(CommandErrorCode.ILLEGAL_STATE, message);
  }
}

/**
 * Suggestion computation cancelled through an abort signal or timeout
 */
export class SuggestionsAbortedError extends CommandError {
  override readonly name: string = 'SuggestionsAbortedError';

  constructor(reason?: unknown) {
    super(CommandErrorCode.SUGGESTIONS_ABORTED, 'Suggestion computation was aborted', {
      cause: reason,
    });
  }
}

/**
 * One failed branch of a forked execution
 */
export interface BranchFailure<TContext> {
  context: TContext;
  error: unknown;
}

/**
 * Aggregate of every branch that failed during a forked execution.
 * Successful branches are counted, not listed.
 */
export class ForkedExecutionError<TContext = unknown> extends CommandError {
  override readonly name: string = 'ForkedExecutionError';

  constructor(
    public readonly failures: readonly BranchFailure<TContext>[],
    public readonly successes: number
  ) {
    super(
      CommandErrorCode.FORKED_EXECUTION,
      `${failures.length} forked branch(es) failed, ${successes} succeeded`
    );
  }

  get errors(): unknown[] {
    return this.failures.map((failure) => failure.error);
  }
}

/**
 * Type guard for CommandError
 */
export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}
