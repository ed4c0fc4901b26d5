/**
 * @fileoverview Built-in syntax error catalogue
 *
 * Error types raised by the reader, the literal nodes, the dispatcher and the
 * stock argument types. Keys are stable so hosts can translate them.
 */

import { DynamicErrorType, ParameterizedErrorType, SimpleErrorType } from './syntax-error.js';

function tooLow(type: string, label: string): ParameterizedErrorType {
  return new ParameterizedErrorType(
    `argument.${type}.low`,
    `${label} must not be less than \${minimum}, found \${found}`,
    'found',
    'minimum'
  );
}

function tooHigh(type: string, label: string): ParameterizedErrorType {
  return new ParameterizedErrorType(
    `argument.${type}.big`,
    `${label} must not be more than \${maximum}, found \${found}`,
    'found',
    'maximum'
  );
}

export const BuiltInErrors = {
  doubleTooLow: tooLow('double', 'Double'),
  doubleTooHigh: tooHigh('double', 'Double'),
  floatTooLow: tooLow('float', 'Float'),
  floatTooHigh: tooHigh('float', 'Float'),
  integerTooLow: tooLow('integer', 'Integer'),
  integerTooHigh: tooHigh('integer', 'Integer'),
  longTooLow: tooLow('long', 'Long'),
  longTooHigh: tooHigh('long', 'Long'),

  literalIncorrect: new ParameterizedErrorType(
    'argument.literal.incorrect',
    'Expected literal ${expected}',
    'expected'
  ),

  readerExpectedStartOfQuote: new SimpleErrorType(
    'parsing.quote.expected.start',
    'Expected quote to start a string'
  ),
  readerExpectedEndOfQuote: new SimpleErrorType('parsing.quote.expected.end', 'Unclosed quoted string'),
  readerInvalidEscape: new ParameterizedErrorType(
    'parsing.quote.escape',
    "Invalid escape sequence '${character}' in quoted string",
    'character'
  ),
  readerInvalidBool: new ParameterizedErrorType(
    'parsing.bool.invalid',
    "Invalid bool, expected true or false but found '${value}'",
    'value'
  ),
  readerExpectedBool: new SimpleErrorType('parsing.bool.expected', 'Expected bool'),
  readerInvalidInt: new ParameterizedErrorType('parsing.int.invalid', "Invalid integer '${value}'", 'value'),
  readerExpectedInt: new SimpleErrorType('parsing.int.expected', 'Expected integer'),
  readerInvalidLong: new ParameterizedErrorType('parsing.long.invalid', "Invalid long '${value}'", 'value'),
  readerExpectedLong: new SimpleErrorType('parsing.long.expected', 'Expected long'),
  readerInvalidDouble: new ParameterizedErrorType(
    'parsing.double.invalid',
    "Invalid double '${value}'",
    'value'
  ),
  readerExpectedDouble: new SimpleErrorType('parsing.double.expected', 'Expected double'),
  readerInvalidFloat: new ParameterizedErrorType('parsing.float.invalid', "Invalid float '${value}'", 'value'),
  readerExpectedFloat: new SimpleErrorType('parsing.float.expected', 'Expected float'),
  readerExpectedSymbol: new ParameterizedErrorType('parsing.expected', "Expected '${symbol}'", 'symbol'),

  dispatcherUnknownCommand: new SimpleErrorType('command.unknown.command', 'Unknown command'),
  dispatcherUnknownArgument: new SimpleErrorType(
    'command.unknown.argument',
    'Incorrect argument for command'
  ),
  dispatcherExpectedArgumentSeparator: new SimpleErrorType(
    'command.expected.separator',
    'Expected whitespace to end one argument, but found trailing data'
  ),
  dispatcherParseException: new DynamicErrorType(
    'command.exception',
    (message: string) => `Could not parse command: ${message}`
  ),
} as const;
