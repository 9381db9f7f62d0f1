/**
 * jsondescent – Token definitions
 *
 * The canonical token shapes produced by the lexer and consumed by the
 * parser, plus small classification helpers used by both and by tests.
 *
 * License: Apache-2.0
 */

/////////////////////
// Token shapes    //
/////////////////////

/**
 * Token kinds that carry no payload and stand for a single character.
 */
export type PunctuationTokenType =
  | 'LeftBrace'
  | 'RightBrace'
  | 'LeftBracket'
  | 'RightBracket'
  | 'Comma'
  | 'Colon';

export interface StringToken {
  type: 'String';
  /**
   * String contents without the quotes. `\uXXXX` escapes are decoded;
   * the short escapes (`\n`, `\t`, `\"`, …) are kept as backslash + letter.
   */
  value: string;
}

export interface NumberToken {
  type: 'Number';
  value: number;
}

export interface BoolToken {
  type: 'Bool';
  value: boolean;
}

export interface NullToken {
  type: 'Null';
}

/**
 * Emitted for each whitespace character and dropped by `tokenize()`.
 */
export interface WhiteSpaceToken {
  type: 'WhiteSpace';
}

export interface PunctuationToken {
  type: PunctuationTokenType;
}

export type Token =
  | StringToken
  | NumberToken
  | BoolToken
  | NullToken
  | WhiteSpaceToken
  | PunctuationToken;

export type TokenType = Token['type'];

/**
 * Tokens that map one-to-one onto a leaf value.
 */
export type ScalarToken = StringToken | NumberToken | BoolToken | NullToken;

//////////////////////////////
// Canonical character sets //
//////////////////////////////

/**
 * Punctuation character → token type.
 */
export const PUNCTUATION_TOKENS: Readonly<Record<string, PunctuationTokenType>> = {
  '{': 'LeftBrace',
  '}': 'RightBrace',
  '[': 'LeftBracket',
  ']': 'RightBracket',
  ',': 'Comma',
  ':': 'Colon',
};

const PUNCTUATION_CHARS: Readonly<Record<PunctuationTokenType, string>> = {
  LeftBrace: '{',
  RightBrace: '}',
  LeftBracket: '[',
  RightBracket: ']',
  Comma: ',',
  Colon: ':',
};

//////////////////////////////
// Type guards & utilities  //
//////////////////////////////

export function isPunctuationToken(token: Token): token is PunctuationToken {
  return token.type in PUNCTUATION_CHARS;
}

export function isScalarToken(token: Token): token is ScalarToken {
  return (
    token.type === 'String' ||
    token.type === 'Number' ||
    token.type === 'Bool' ||
    token.type === 'Null'
  );
}

/**
 * Short human-readable label for a token, used in error messages:
 *
 *   {"a": 1}  →  "{", string "a", ":", number 1, "}"
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'String':
      return `string ${JSON.stringify(token.value)}`;
    case 'Number':
      return `number ${String(token.value)}`;
    case 'Bool':
      return token.value ? 'true' : 'false';
    case 'Null':
      return 'null';
    case 'WhiteSpace':
      return 'whitespace';
    default:
      return `"${PUNCTUATION_CHARS[token.type]}"`;
  }
}

/**
 * Convenience builders, mostly useful in tests and tooling that
 * synthesize token streams.
 */
export function createToken(type: PunctuationTokenType | 'Null' | 'WhiteSpace'): Token;
export function createToken(type: 'String', value: string): StringToken;
export function createToken(type: 'Number', value: number): NumberToken;
export function createToken(type: 'Bool', value: boolean): BoolToken;
export function createToken(
  type: TokenType,
  value?: string | number | boolean,
): Token {
  switch (type) {
    case 'String':
      return { type, value: String(value) };
    case 'Number':
      return { type, value: Number(value) };
    case 'Bool':
      return { type, value: value === true };
    case 'Null':
      return { type };
    case 'WhiteSpace':
      return { type };
    default:
      return { type };
  }
}
