/**
 * jsondescent – Lexer
 *
 * Turns raw JSON text into a flat list of tokens, one code point at a time
 * with a single character of lookahead. Whitespace is recognized and then
 * dropped; everything else maps to exactly one token.
 *
 * Dispatch on the next unconsumed character:
 *  - whitespace           → WhiteSpace (filtered out)
 *  - { } [ ] , :          → punctuation tokens
 *  - "                    → string scanning
 *  - digit + - .          → number scanning
 *  - t / f / n            → literal match for true / false / null
 *  - anything else        → lex error
 *
 * Two behaviors are worth knowing before relying on string values:
 *  - The short escapes (\" \\ \/ \b \f \n \r \t) are kept as backslash +
 *    letter, not decoded into the character they name.
 *  - Numbers are scanned with a permissive character class and only
 *    validated once the run ends, so `+-3` is read whole and then rejected.
 *
 * License: Apache-2.0
 */

import { createLexError } from './errors';
import { PUNCTUATION_TOKENS } from './tokens';
import type { Token } from './tokens';
import { Utf16Buffer } from './utf16';

/////////////////////
// Public API      //
/////////////////////

/**
 * Tokenize a JSON document. Whitespace tokens are not included.
 *
 * Throws:
 *  - DecodeError (E_LEX) on the first invalid character sequence.
 */
export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}

/////////////////////
// Implementation  //
/////////////////////

const LITERALS = {
  true: { text: 'true', token: { type: 'Bool', value: true } },
  false: { text: 'false', token: { type: 'Bool', value: false } },
  null: { text: 'null', token: { type: 'Null' } },
} as const satisfies Record<string, { text: string; token: Token }>;

type LiteralName = keyof typeof LITERALS;

// Standard float grammar: optional sign, digits with an optional fraction
// (or a bare fraction), optional exponent.
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const PASS_THROUGH_ESCAPES = '"\\/bfnrt';

export class Lexer {
  private readonly src: string;
  private pos = 0;

  constructor(source: string) {
    this.src = source;
  }

  /**
   * Consume the whole input and return its tokens.
   *
   * The lexer is single-use: a second call starts where the first one
   * stopped (the end of input) and returns an empty list.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      const tok = this.nextToken();
      if (tok === null) break;
      if (tok.type === 'WhiteSpace') continue;
      tokens.push(tok);
    }

    return tokens;
  }

  /**
   * Read the next token, or `null` at end of input.
   */
  private nextToken(): Token | null {
    const ch = this.peekChar();
    if (ch === undefined) return null;

    if (isWhitespace(ch)) {
      this.nextChar();
      return { type: 'WhiteSpace' };
    }

    const punct = PUNCTUATION_TOKENS[ch];
    if (punct !== undefined) {
      this.nextChar();
      return { type: punct };
    }

    if (ch === '"') {
      this.nextChar(); // opening quote
      return this.readStringToken();
    }

    if (isNumberStart(ch)) {
      return this.readNumberToken();
    }

    if (ch === 't') return this.readLiteralToken('true');
    if (ch === 'f') return this.readLiteralToken('false');
    if (ch === 'n') return this.readLiteralToken('null');

    throw createLexError({
      message: `jsondescent: unexpected character ${JSON.stringify(ch)}.`,
      note: ch === "'" ? 'JSON strings use double quotes.' : undefined,
    });
  }

  ///////////////////////
  // Cursor            //
  ///////////////////////

  private peekChar(): string | undefined {
    const cp = this.src.codePointAt(this.pos);
    return cp === undefined ? undefined : String.fromCodePoint(cp);
  }

  private nextChar(): string | undefined {
    const ch = this.peekChar();
    if (ch !== undefined) this.pos += ch.length;
    return ch;
  }

  ///////////////////////
  // Token readers     //
  ///////////////////////

  /**
   * Read exactly as many characters as the literal has. Running out of
   * input counts as a mismatch.
   */
  private readLiteralToken(name: LiteralName): Token {
    const { text, token } = LITERALS[name];

    let read = '';
    for (let i = 0; i < text.length; i++) {
      const ch = this.nextChar();
      if (ch === undefined) break;
      read += ch;
    }

    if (read !== text) {
      throw createLexError({
        message: `jsondescent: expected literal "${text}" but read ${JSON.stringify(read)}.`,
      });
    }

    return { ...token };
  }

  private readNumberToken(): Token {
    let run = '';

    for (;;) {
      const ch = this.peekChar();
      if (ch === undefined || !isNumberChar(ch)) break;
      this.nextChar();
      run += ch;
    }

    if (!FLOAT_PATTERN.test(run)) {
      throw createLexError({
        message: `jsondescent: malformed number "${run}" (invalid float literal).`,
      });
    }

    return { type: 'Number', value: Number(run) };
  }

  /**
   * Read up to the closing quote. The opening quote is already consumed.
   */
  private readStringToken(): Token {
    const utf16 = new Utf16Buffer();
    let value = '';

    for (;;) {
      const ch = this.nextChar();

      if (ch === undefined) {
        throw createLexError({
          message: 'jsondescent: unterminated string.',
        });
      }

      if (ch === '"') {
        value += utf16.flush();
        return { type: 'String', value };
      }

      if (ch !== '\\') {
        value += utf16.flush();
        value += ch;
        continue;
      }

      const esc = this.nextChar();

      if (esc === undefined) {
        throw createLexError({
          message: 'jsondescent: unterminated escape sequence in string.',
        });
      }

      if (esc === 'u') {
        utf16.push(this.readUnicodeEscape());
        continue;
      }

      if (PASS_THROUGH_ESCAPES.includes(esc)) {
        value += utf16.flush();
        value += '\\' + esc;
        continue;
      }

      throw createLexError({
        message: `jsondescent: unexpected escape character ${JSON.stringify(esc)} in string.`,
      });
    }
  }

  /**
   * Read the four hex digits following `\u` and return the code unit.
   */
  private readUnicodeEscape(): number {
    let hex = '';

    while (hex.length < 4) {
      const ch = this.nextChar();
      if (ch === undefined || !isHexDigit(ch)) {
        throw createLexError({
          message: `jsondescent: malformed unicode escape "\\u${hex}${ch ?? ''}".`,
        });
      }
      hex += ch;
    }

    return parseInt(hex, 16);
  }
}

////////////////////////////
// Character classification
////////////////////////////

/**
 * Unicode White_Space.
 */
function isWhitespace(ch: string): boolean {
  const cp = ch.codePointAt(0);
  if (cp === undefined) return false;
  return (
    (cp >= 0x09 && cp <= 0x0d) || // \t \n \v \f \r
    cp === 0x20 || // space
    cp === 0x85 || // NEL
    cp === 0xa0 || // NBSP
    cp === 0x1680 ||
    (cp >= 0x2000 && cp <= 0x200a) ||
    cp === 0x2028 || // line separator
    cp === 0x2029 || // paragraph separator
    cp === 0x202f ||
    cp === 0x205f ||
    cp === 0x3000
  );
}

function isDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

function isNumberStart(ch: string): boolean {
  return isDigit(ch) || ch === '+' || ch === '-' || ch === '.';
}

function isNumberChar(ch: string): boolean {
  return isNumberStart(ch) || ch === 'e' || ch === 'E';
}

function isHexDigit(ch: string): boolean {
  return /^[0-9a-fA-F]$/.test(ch);
}
