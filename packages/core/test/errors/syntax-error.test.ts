/**
 * @fileoverview Syntax Error Tests
 */
import { describe, it, expect } from 'vitest';
import { BuiltInErrors } from '../../src/errors/built-in.js';
import {
  CommandSyntaxError,
  DynamicErrorType,
  ParameterizedErrorType,
  SimpleErrorType,
  isCommandSyntaxError,
} from '../../src/errors/syntax-error.js';
import {
  CommandErrorCode,
  ForkedExecutionError,
  TreeStructureError,
  isCommandError,
} from '../../src/errors/command-errors.js';
import { StringReader } from '../../src/reader/string-reader.js';

describe('CommandSyntaxError', () => {
  it('should use the raw message when created without input', () => {
    const error = BuiltInErrors.dispatcherUnknownCommand.create();

    expect(error.message).toBe('Unknown command');
    expect(error.input).toBeNull();
    expect(error.cursor).toBe(-1);
    expect(error.getContext()).toBeNull();
  });

  it('should point at the cursor with the preceding input', () => {
    const reader = new StringReader('foo bar');
    reader.setCursor(3);
    const error = BuiltInErrors.dispatcherUnknownCommand.createWithContext(reader);

    expect(error.message).toBe('Unknown command at position 3: foo<--[HERE]');
    expect(error.rawMessage).toBe('Unknown command');
  });

  it('should truncate long context to the last ten characters', () => {
    const reader = new StringReader('0123456789abcdef');
    reader.setCursor(15);
    const error = BuiltInErrors.dispatcherUnknownCommand.createWithContext(reader);

    expect(error.getContext()).toBe('...56789abcde<--[HERE]');
  });

  it('should carry the syntax code and be recognised by both guards', () => {
    const error = new SimpleErrorType('test.key', 'Broken').create();

    expect(error.code).toBe(CommandErrorCode.SYNTAX);
    expect(error.errorType.key).toBe('test.key');
    expect(isCommandSyntaxError(error)).toBe(true);
    expect(isCommandError(error)).toBe(true);
    expect(isCommandSyntaxError(new Error('plain'))).toBe(false);
  });
});

describe('ParameterizedErrorType', () => {
  it('should bind values to parameter names and render the template', () => {
    const error = BuiltInErrors.integerTooLow.create(-5, 0);

    expect(error.message).toBe('Integer must not be less than 0, found -5');
    expect(error.parameters).toEqual({ found: -5, minimum: 0 });
    expect(error.errorType.key).toBe('argument.integer.low');
  });

  it('should leave unknown placeholders untouched', () => {
    const type = new ParameterizedErrorType('test.key', 'Got ${value} and ${other}', 'value');

    expect(type.create('x').rawMessage).toBe('Got x and ${other}');
  });
});

describe('DynamicErrorType', () => {
  it('should index its arguments', () => {
    const type = new DynamicErrorType('test.key', (a: string, b: number) => `${a}:${b}`);
    const error = type.create('left', 2);

    expect(error.message).toBe('left:2');
    expect(error.parameters).toEqual({ '0': 'left', '1': 2 });
  });

  it('should format parse failures', () => {
    expect(BuiltInErrors.dispatcherParseException.create('boom').message).toBe(
      'Could not parse command: boom'
    );
  });
});

describe('command errors', () => {
  it('should name the structural error', () => {
    const error = new TreeStructureError('bad tree');

    expect(error.code).toBe(CommandErrorCode.TREE_STRUCTURE);
    expect(error.name).toBe('TreeStructureError');
    expect(error).not.toBeInstanceOf(CommandSyntaxError);
  });

  it('should summarise forked failures', () => {
    const error = new ForkedExecutionError(
      [
        { context: 'a', error: new Error('one') },
        { context: 'b', error: new Error('two') },
      ],
      3
    );

    expect(error.message).toBe('2 forked branch(es) failed, 3 succeeded');
    expect(error.errors).toHaveLength(2);
    expect(error.successes).toBe(3);
  });
});
