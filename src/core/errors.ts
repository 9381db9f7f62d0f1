/**
 * jsondescent – Error types & helpers
 *
 * This module defines the single error class (`DecodeError`) thrown by the
 * lexer, the parser and the decoder facade, plus factory helpers that keep
 * codes and messages consistent.
 *
 * Common usage:
 *
 *  - Lexer:
 *      throw createLexError({
 *        message: 'jsondescent: unterminated string.',
 *      });
 *
 *  - Parser:
 *      throw createParseError({
 *        message: 'jsondescent: expected ":" after object key "a" but found "}".',
 *      });
 *
 * Errors carry a descriptive message only; there is no line/column tracking.
 *
 * License: Apache-2.0
 */

//////////////////////
// Error code enum  //
//////////////////////

/**
 * High-level error categories.
 */
export type DecodeErrorCode =
  /**
   * Lexical problems:
   *  - unexpected characters, malformed literals and numbers
   *  - bad escapes, malformed \u sequences, unpaired surrogates
   *  - unterminated strings
   */
  | 'E_LEX'
  /**
   * Structural problems in the token stream:
   *  - missing ":" / "," / "}" / "]"
   *  - non-string object keys
   *  - token stream exhausted while a value was required
   */
  | 'E_PARSE'
  /**
   * A configured limit was exceeded (input length, nesting depth).
   */
  | 'E_LIMIT'
  /**
   * Invariants that should never break.
   */
  | 'E_INTERNAL';

export interface DecodeErrorOptions {
  code: DecodeErrorCode;

  /**
   * Human-readable error message (single line).
   */
  message: string;

  /**
   * Optional hint, e.g. "JSON strings use double quotes".
   */
  note?: string;

  /**
   * Optional underlying error; exposed as the standard `error.cause`.
   */
  cause?: unknown;
}

export class DecodeError extends Error {
  public readonly name = 'DecodeError';
  public readonly code: DecodeErrorCode;

  /**
   * Optional additional note or hint.
   */
  public readonly note?: string;

  constructor(opts: DecodeErrorOptions) {
    const { message, code, cause } = opts;
    super(message, cause !== undefined ? { cause } : undefined);

    Object.setPrototypeOf(this, new.target.prototype);

    this.code = code;
    this.note = opts.note;
  }
}

export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError;
}

/**
 * True for errors raised while turning characters into tokens.
 */
export function isLexError(err: unknown): err is DecodeError {
  return isDecodeError(err) && err.code === 'E_LEX';
}

/**
 * True for errors raised while turning tokens into a value tree.
 */
export function isParseError(err: unknown): err is DecodeError {
  return isDecodeError(err) && err.code === 'E_PARSE';
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

export function createLexError(
  opts: Omit<DecodeErrorOptions, 'code'>,
): DecodeError {
  return new DecodeError({ ...opts, code: 'E_LEX' });
}

export function createParseError(
  opts: Omit<DecodeErrorOptions, 'code'>,
): DecodeError {
  return new DecodeError({ ...opts, code: 'E_PARSE' });
}

/**
 * Create a limit error (input too long, nesting too deep).
 */
export function createLimitError(
  opts: Omit<DecodeErrorOptions, 'code'>,
): DecodeError {
  return new DecodeError({ ...opts, code: 'E_LIMIT' });
}

/**
 * Create an internal error (unexpected conditions / invariants).
 */
export function createInternalError(
  opts: Omit<DecodeErrorOptions, 'code'>,
): DecodeError {
  return new DecodeError({ ...opts, code: 'E_INTERNAL' });
}
