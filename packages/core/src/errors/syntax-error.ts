/**
 * @fileoverview Syntax Errors
 *
 * CommandSyntaxError is what every parse attempt throws. It carries the raw
 * message, the error type that produced it (with its translation key and
 * parameters, so hosts can render their own text) and, when created against a
 * reader, the input and the cursor position where parsing stopped.
 *
 * Error types are factories: built-ins live in built-in.ts, hosts and
 * argument types declare their own.
 */

import type { ImmutableStringReader } from '../reader/string-reader.js';
import { CommandError, CommandErrorCode } from './command-errors.js';

export type ErrorParameters = Readonly<Record<string, unknown>>;

/**
 * Anything that can produce a CommandSyntaxError
 */
export interface SyntaxErrorType {
  readonly key: string;
}

interface SyntaxErrorInit {
  input?: string | null;
  cursor?: number;
  parameters?: ErrorParameters;
}

/** Characters of input shown before the cursor in error messages */
const CONTEXT_AMOUNT = 10;

function contextOf(input: string | null, cursor: number): string | null {
  if (input === null || cursor < 0) {
    return null;
  }
  const end = Math.min(input.length, cursor);
  const prefix = end > CONTEXT_AMOUNT ? '...' : '';
  return `${prefix}${input.substring(Math.max(0, end - CONTEXT_AMOUNT), end)}<--[HERE]`;
}

export class CommandSyntaxError extends CommandError {
  override readonly name: string = 'CommandSyntaxError';

  readonly input: string | null;
  readonly cursor: number;
  readonly parameters: ErrorParameters;

  constructor(
    public readonly errorType: SyntaxErrorType,
    public readonly rawMessage: string,
    init: SyntaxErrorInit = {}
  ) {
    const input = init.input ?? null;
    const cursor = init.cursor ?? -1;
    const context = contextOf(input, cursor);
    super(
      CommandErrorCode.SYNTAX,
      context === null ? rawMessage : `${rawMessage} at position ${cursor}: ${context}`
    );
    this.input = input;
    this.cursor = cursor;
    this.parameters = init.parameters ?? {};
  }

  /**
   * The input up to the cursor, truncated to the last few characters
   */
  getContext(): string | null {
    return contextOf(this.input, this.cursor);
  }
}

/**
 * Type guard for CommandSyntaxError
 */
export function isCommandSyntaxError(error: unknown): error is CommandSyntaxError {
  return error instanceof CommandSyntaxError;
}

function readerInit(reader: ImmutableStringReader, parameters?: ErrorParameters): SyntaxErrorInit {
  return { input: reader.getString(), cursor: reader.getCursor(), parameters };
}

/**
 * Error type with a fixed message
 */
export class SimpleErrorType implements SyntaxErrorType {
  constructor(
    readonly key: string,
    readonly message: string
  ) {}

  create(): CommandSyntaxError {
    return new CommandSyntaxError(this, this.message);
  }

  createWithContext(reader: ImmutableStringReader): CommandSyntaxError {
    return new CommandSyntaxError(this, this.message, readerInit(reader));
  }
}

/**
 * Error type whose message is computed from positional arguments
 */
export class DynamicErrorType<TArgs extends unknown[]> implements SyntaxErrorType {
  constructor(
    readonly key: string,
    private readonly format: (...args: TArgs) => string
  ) {}

  create(...args: TArgs): CommandSyntaxError {
    return new CommandSyntaxError(this, this.format(...args), { parameters: indexed(args) });
  }

  createWithContext(reader: ImmutableStringReader, ...args: TArgs): CommandSyntaxError {
    return new CommandSyntaxError(this, this.format(...args), readerInit(reader, indexed(args)));
  }
}

function indexed(values: readonly unknown[]): ErrorParameters {
  return Object.fromEntries(values.map((value, index) => [String(index), value]));
}

/**
 * Error type backed by a `${name}` template. Values passed to create() are
 * bound to the declared parameter names in order.
 *
 * @example
 * const tooLow = new ParameterizedErrorType(
 *   'argument.double.low',
 *   'Double must not be less than ${minimum}, found ${found}',
 *   'found',
 *   'minimum'
 * );
 * tooLow.create(-1, 0).message; // 'Double must not be less than 0, found -1'
 */
export class ParameterizedErrorType implements SyntaxErrorType {
  readonly parameterNames: readonly string[];

  constructor(
    readonly key: string,
    readonly template: string,
    ...parameterNames: string[]
  ) {
    this.parameterNames = parameterNames;
  }

  bind(values: readonly unknown[]): ErrorParameters {
    const parameters: Record<string, unknown> = {};
    this.parameterNames.forEach((name, index) => {
      parameters[name] = values[index];
    });
    return parameters;
  }

  render(parameters: ErrorParameters): string {
    return this.template.replace(/\$\{(\w+)\}/g, (match, name: string) =>
      Object.prototype.hasOwnProperty.call(parameters, name) ? String(parameters[name]) : match
    );
  }

  create(...values: unknown[]): CommandSyntaxError {
    const parameters = this.bind(values);
    return new CommandSyntaxError(this, this.render(parameters), { parameters });
  }

  createWithContext(reader: ImmutableStringReader, ...values: unknown[]): CommandSyntaxError {
    const parameters = this.bind(values);
    return new CommandSyntaxError(this, this.render(parameters), readerInit(reader, parameters));
  }
}
