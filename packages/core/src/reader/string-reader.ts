/**
 * @fileoverview String Reader
 *
 * Cursor-based scanner over a command line. Node variants and argument
 * types read through it; the parser copies it before every attempt so a
 * failed candidate never moves the caller's cursor.
 */

import { BuiltInErrors } from '../errors/built-in.js';

const SYNTAX_ESCAPE = '\\';
const SYNTAX_DOUBLE_QUOTE = '"';
const SYNTAX_SINGLE_QUOTE = "'";

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Read-only view of a reader, handed to context predicates and error factories
 */
export interface ImmutableStringReader {
  getString(): string;
  getCursor(): number;
  getRemainingLength(): number;
  getTotalLength(): number;
  getRead(): string;
  getRemaining(): string;
  canRead(length?: number): boolean;
  peek(offset?: number): string;
}

export class StringReader implements ImmutableStringReader {
  private readonly string: string;
  private cursor: number;

  constructor(source: string | StringReader) {
    if (typeof source === 'string') {
      this.string = source;
      this.cursor = 0;
    } else {
      this.string = source.string;
      this.cursor = source.cursor;
    }
  }

  static isAllowedNumber(c: string): boolean {
    return (c >= '0' && c <= '9') || c === '.' || c === '-';
  }

  static isQuotedStringStart(c: string): boolean {
    return c === SYNTAX_DOUBLE_QUOTE || c === SYNTAX_SINGLE_QUOTE;
  }

  static isAllowedInUnquotedString(c: string): boolean {
    return (
      (c >= '0' && c <= '9') ||
      (c >= 'A' && c <= 'Z') ||
      (c >= 'a' && c <= 'z') ||
      c === '_' ||
      c === '-' ||
      c === '.' ||
      c === '+'
    );
  }

  getString(): string {
    return this.string;
  }

  getCursor(): number {
    return this.cursor;
  }

  setCursor(cursor: number): void {
    this.cursor = cursor;
  }

  getRemainingLength(): number {
    return this.string.length - this.cursor;
  }

  getTotalLength(): number {
    return this.string.length;
  }

  getRead(): string {
    return this.string.substring(0, this.cursor);
  }

  getRemaining(): string {
    return this.string.substring(this.cursor);
  }

  canRead(length = 1): boolean {
    return this.cursor + length <= this.string.length;
  }

  peek(offset = 0): string {
    return this.string.charAt(this.cursor + offset);
  }

  read(): string {
    return this.string.charAt(this.cursor++);
  }

  skip(): void {
    this.cursor++;
  }

  skipWhitespace(): void {
    while (this.canRead() && /\s/.test(this.peek())) {
      this.skip();
    }
  }

  /** Consume the longest run of number characters */
  private readNumberToken(): string {
    const start = this.cursor;
    while (this.canRead() && StringReader.isAllowedNumber(this.peek())) {
      this.skip();
    }
    return this.string.substring(start, this.cursor);
  }

  readInt(): number {
    const start = this.cursor;
    const token = this.readNumberToken();
    if (token.length === 0) {
      throw BuiltInErrors.readerExpectedInt.createWithContext(this);
    }
    const value = INTEGER_PATTERN.test(token) ? Number(token) : NaN;
    if (!Number.isInteger(value) || value < INT_MIN || value > INT_MAX) {
      this.cursor = start;
      throw BuiltInErrors.readerInvalidInt.createWithContext(this, token);
    }
    return value;
  }

  readLong(): bigint {
    const start = this.cursor;
    const token = this.readNumberToken();
    if (token.length === 0) {
      throw BuiltInErrors.readerExpectedLong.createWithContext(this);
    }
    const value = INTEGER_PATTERN.test(token) ? BigInt(token) : null;
    if (value === null || value < LONG_MIN || value > LONG_MAX) {
      this.cursor = start;
      throw BuiltInErrors.readerInvalidLong.createWithContext(this, token);
    }
    return value;
  }

  readDouble(): number {
    const start = this.cursor;
    const token = this.readNumberToken();
    if (token.length === 0) {
      throw BuiltInErrors.readerExpectedDouble.createWithContext(this);
    }
    if (!DECIMAL_PATTERN.test(token)) {
      this.cursor = start;
      throw BuiltInErrors.readerInvalidDouble.createWithContext(this, token);
    }
    return Number(token);
  }

  readFloat(): number {
    const start = this.cursor;
    const token = this.readNumberToken();
    if (token.length === 0) {
      throw BuiltInErrors.readerExpectedFloat.createWithContext(this);
    }
    if (!DECIMAL_PATTERN.test(token)) {
      this.cursor = start;
      throw BuiltInErrors.readerInvalidFloat.createWithContext(this, token);
    }
    return Math.fround(Number(token));
  }

  readUnquotedString(): string {
    const start = this.cursor;
    while (this.canRead() && StringReader.isAllowedInUnquotedString(this.peek())) {
      this.skip();
    }
    return this.string.substring(start, this.cursor);
  }

  readQuotedString(): string {
    if (!this.canRead()) {
      return '';
    }
    const next = this.peek();
    if (!StringReader.isQuotedStringStart(next)) {
      throw BuiltInErrors.readerExpectedStartOfQuote.createWithContext(this);
    }
    this.skip();
    return this.readStringUntil(next);
  }

  /**
   * Read up to an unescaped terminator and consume it. Only the terminator
   * and the escape character itself may follow a backslash.
   */
  readStringUntil(terminator: string): string {
    let result = '';
    let escaped = false;
    while (this.canRead()) {
      const c = this.read();
      if (escaped) {
        if (c === terminator || c === SYNTAX_ESCAPE) {
          result += c;
          escaped = false;
        } else {
          this.cursor--;
          throw BuiltInErrors.readerInvalidEscape.createWithContext(this, c);
        }
      } else if (c === SYNTAX_ESCAPE) {
        escaped = true;
      } else if (c === terminator) {
        return result;
      } else {
        result += c;
      }
    }
    throw BuiltInErrors.readerExpectedEndOfQuote.createWithContext(this);
  }

  readString(): string {
    if (!this.canRead()) {
      return '';
    }
    const next = this.peek();
    if (StringReader.isQuotedStringStart(next)) {
      this.skip();
      return this.readStringUntil(next);
    }
    return this.readUnquotedString();
  }

  readBoolean(): boolean {
    const start = this.cursor;
    const value = this.readString();
    if (value.length === 0) {
      throw BuiltInErrors.readerExpectedBool.createWithContext(this);
    }
    if (value === 'true') {
      return true;
    }
    if (value === 'false') {
      return false;
    }
    this.cursor = start;
    throw BuiltInErrors.readerInvalidBool.createWithContext(this, value);
  }

  expect(c: string): void {
    if (!this.canRead() || this.peek() !== c) {
      throw BuiltInErrors.readerExpectedSymbol.createWithContext(this, c);
    }
    this.skip();
  }
}
