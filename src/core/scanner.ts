/**
 * BVH Scanner
 *
 * Stateful cursor over an immutable text buffer. Provides the primitive
 * lexers used by the hierarchy and motion parsers. Readers return a value
 * together with a success flag; callers branch on the flag, never on the
 * value, since the failure values (-1, NaN) can also be legitimate input.
 */

import { BVH_LIMITS } from '../constants/bvh';
import { BvhErrorFactory } from '../errors';
import { ChannelKind } from './bvh-document';

export interface ScanResult<T> {
  value: T;
  success: boolean;
}

/**
 * Case folding used for keyword comparison: ASCII letters to upper case,
 * tab, CR and LF to a space.
 */
export function foldChar(c: string): string {
  if (c >= 'a' && c <= 'z') {
    return c.toUpperCase();
  }
  if (c === '\t' || c === '\n' || c === '\r') {
    return ' ';
  }
  return c;
}

function isDigit(c: string | undefined): c is string {
  return c !== undefined && c >= '0' && c <= '9';
}

function isNewline(c: string | undefined): boolean {
  return c === '\n' || c === '\r';
}

function isInlineWhitespace(c: string | undefined): boolean {
  return c === ' ' || c === '\t';
}

export class BvhScanner {
  private readonly text: string;
  private pos = 0;

  constructor(text: string) {
    this.text = text;
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.text.length;
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  /**
   * Character at the cursor, or null at end of buffer
   */
  peek(): string | null {
    return this.pos < this.text.length ? this.text[this.pos] : null;
  }

  /**
   * Consumes `literal` when the upcoming characters match it after folding.
   * On a mismatch the cursor is left where it was.
   */
  expectLiteral(literal: string): boolean {
    if (this.pos + literal.length > this.text.length) {
      return false;
    }
    for (let i = 0; i < literal.length; i++) {
      if (foldChar(literal[i]) !== foldChar(this.text[this.pos + i])) {
        return false;
      }
    }
    this.pos += literal.length;
    return true;
  }

  /**
   * Skips spaces, tabs and line breaks
   */
  skipWhitespace(): void {
    while (this.pos < this.text.length && (isInlineWhitespace(this.text[this.pos]) || isNewline(this.text[this.pos]))) {
      this.pos++;
    }
  }

  /**
   * Skips spaces and tabs only
   */
  skipInlineWhitespace(): void {
    while (this.pos < this.text.length && isInlineWhitespace(this.text[this.pos])) {
      this.pos++;
    }
  }

  /**
   * Requires at least one line break after optional inline whitespace and
   * consumes every consecutive CR/LF.
   */
  expectNewline(): void {
    this.skipInlineWhitespace();
    let found = false;
    while (this.pos < this.text.length && isNewline(this.text[this.pos])) {
      found = true;
      this.pos++;
    }
    this.assure('newline', found);
  }

  /**
   * Rest of the current line, trimmed. Fails when nothing but whitespace.
   */
  readLineString(): ScanResult<string> {
    const start = this.pos;
    while (this.pos < this.text.length && !isNewline(this.text[this.pos])) {
      this.pos++;
    }
    const value = this.text.substring(start, this.pos).trim();
    return { value, success: value.length !== 0 };
  }

  /**
   * Optional sign followed by decimal digits.
   * Without digits the result is { value: -1, success: false } and the
   * cursor stays at the sign.
   */
  readInt(): ScanResult<number> {
    const start = this.pos;
    let negate = false;
    let digitFound = false;
    let value = 0;

    if (this.text[this.pos] === '-') {
      negate = true;
      this.pos++;
    } else if (this.text[this.pos] === '+') {
      this.pos++;
    }

    while (isDigit(this.text[this.pos])) {
      value = value * 10 + (this.text.charCodeAt(this.pos++) - 48);
      digitFound = true;
    }

    if (!digitFound) {
      this.pos = start;
      return { value: -1, success: false };
    }
    return { value: negate ? -value : value, success: true };
  }

  /**
   * Optional sign, integer digits, then an optional '.' or ',' with
   * fractional digits. Fractional digits are accumulated by repeated
   * multiplication with 0.1 up to MAX_FRACTION_DIGITS; later digits are
   * consumed and dropped. Without any digit the result is NaN and the
   * cursor stays where it was.
   */
  readFloat(): ScanResult<number> {
    const start = this.pos;
    let negate = false;
    let digitFound = false;
    let value = 0;

    if (this.text[this.pos] === '-') {
      negate = true;
      this.pos++;
    } else if (this.text[this.pos] === '+') {
      this.pos++;
    }

    while (isDigit(this.text[this.pos])) {
      value = value * 10 + (this.text.charCodeAt(this.pos++) - 48);
      digitFound = true;
    }

    const separator = this.text[this.pos];
    if (separator === '.' || separator === ',') {
      this.pos++;

      let fac = 0.1;
      let digits = 0;
      while (isDigit(this.text[this.pos])) {
        const digit = this.text.charCodeAt(this.pos++) - 48;
        if (digits < BVH_LIMITS.MAX_FRACTION_DIGITS) {
          value += fac * digit;
          fac *= 0.1;
        }
        digits++;
        digitFound = true;
      }
    }

    if (!digitFound) {
      this.pos = start;
      return { value: NaN, success: false };
    }
    return { value: negate ? -value : value, success: true };
  }

  /**
   * Recognizes Xposition ... Zrotation. The axis letter and the p/r letter
   * select the kind, the remainder of the word must follow.
   */
  readChannelToken(): ScanResult<ChannelKind> {
    const failed: ScanResult<ChannelKind> = { value: ChannelKind.Xposition, success: false };
    const start = this.pos;
    if (this.pos + 1 >= this.text.length) {
      return failed;
    }

    let axis: number;
    switch (foldChar(this.text[this.pos])) {
      case 'X':
        axis = 0;
        break;
      case 'Y':
        axis = 1;
        break;
      case 'Z':
        axis = 2;
        break;
      default:
        return failed;
    }
    this.pos++;

    const kindLetter = foldChar(this.text[this.pos]);
    this.pos++;
    if (kindLetter === 'P' && this.expectLiteral('osition')) {
      return { value: axis, success: true };
    }
    if (kindLetter === 'R' && this.expectLiteral('otation')) {
      return { value: axis + 3, success: true };
    }

    this.pos = start;
    return failed;
  }

  /**
   * Excerpt of the buffer around the cursor with the current character
   * marked as >>>c<<<.
   */
  contextWindow(): string {
    const radius = BVH_LIMITS.CONTEXT_RADIUS;
    const from = Math.max(0, this.pos - radius);
    const to = Math.min(this.text.length, this.pos + radius);
    const before = this.text.substring(from, this.pos);
    const current = this.text.substring(this.pos, this.pos + 1);
    const after = this.text.substring(Math.min(this.pos + 1, to), to);
    return `${before}>>>${current}<<<${after}`;
  }

  /**
   * Raises a structural parse failure at the cursor
   */
  fail(expected: string): never {
    throw BvhErrorFactory.parseError(this.pos, expected, this.contextWindow());
  }

  /**
   * Raises a numeric parse failure at the cursor
   */
  failNumeric(expected: string): never {
    throw BvhErrorFactory.numericParseError(this.pos, expected, this.contextWindow());
  }

  assure(expected: string, result: boolean): void {
    if (!result) {
      this.fail(expected);
    }
  }

  /**
   * Consumes a keyword or raises a parse failure naming it
   */
  assureLiteral(literal: string): void {
    this.assure(literal, this.expectLiteral(literal));
  }

  /**
   * Reads an integer or raises a numeric parse failure
   */
  assureInt(expected: string): number {
    const result = this.readInt();
    if (!result.success) {
      this.failNumeric(expected);
    }
    return result.value;
  }

  /**
   * Reads a float or raises a numeric parse failure
   */
  assureFloat(expected: string): number {
    const result = this.readFloat();
    if (!result.success) {
      this.failNumeric(expected);
    }
    return result.value;
  }
}
