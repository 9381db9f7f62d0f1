/**
 * jsondescent – Public entry point
 *
 * It provides:
 *  - The decoder factory (`createDecoder`) and one-shot helpers
 *    (`decode`, `tryDecode`, `tokenize`).
 *  - The lexer and parser classes for callers that drive the stages
 *    themselves.
 *  - Value tree types, constructors and plain-JS interop.
 *  - Inspection utilities and the Node body-decoding middleware.
 *
 * Typical usage:
 *
 *   import { decode, toPlain } from 'jsondescent';
 *
 *   const value = decode('{"b": 1, "a": [true, null]}');
 *   // value.type === 'Object'; value.entries.keys() → ['a', 'b']
 *
 *   toPlain(value); // { a: [true, null], b: 1 }
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Decoder                 //
/////////////////////////////

import { createDecoder, normalizeDecoderOptions } from './core/decoder';
import type {
  Decoder,
  DecoderOptions,
  NormalizedDecoderOptions,
  DecodeResult,
} from './core/decoder';

import { Lexer } from './core/lexer';
import { Parser, parseTokens } from './core/parser';
import type { ParseOptions } from './core/parser';

import {
  PUNCTUATION_TOKENS,
  createToken,
  describeToken,
  isPunctuationToken,
  isScalarToken,
} from './core/tokens';
import type {
  Token,
  TokenType,
  ScalarToken,
  PunctuationTokenType,
  StringToken,
  NumberToken,
  BoolToken,
  NullToken,
  WhiteSpaceToken,
  PunctuationToken,
} from './core/tokens';

import { SortedKeyMap, compareKeys } from './core/sortedMap';
import { Utf16Buffer } from './core/utf16';

import {
  nullValue,
  boolValue,
  numberValue,
  stringValue,
  arrayValue,
  objectValue,
  isNullValue,
  isBoolValue,
  isNumberValue,
  isStringValue,
  isArrayValue,
  isObjectValue,
  valueEquals,
  toPlain,
  fromPlain,
} from './core/value';
import type {
  JsonValue,
  ValueType,
  PlainJson,
  NullValue,
  BoolValue,
  NumberValue,
  StringValue,
  ArrayValue,
  ObjectValue,
} from './core/value';

import {
  DecodeError,
  isDecodeError,
  isLexError,
  isParseError,
} from './core/errors';
import type { DecodeErrorCode, DecodeErrorOptions } from './core/errors';

/////////////////////////////
// Utilities               //
/////////////////////////////

import {
  inspectValue,
  formatDecodeError,
  analyzeValue,
  inspectSource,
} from './utils/inspect';
import type {
  InspectValueOptions,
  FormattedDecodeError,
  ValueInsight,
  InspectSourceOptions,
} from './utils/inspect';

/////////////////////////////
// Node integration        //
/////////////////////////////

import {
  createJsonBodyMiddleware,
  isJsonBodyResult,
} from './integrations/node/jsonBodyMiddleware';
import type {
  JsonBodyRequest,
  JsonBodyResponse,
  JsonBodyResult,
  JsonBodyResponsePayload,
  JsonBodyMiddlewareOptions,
  NextFunction,
} from './integrations/node/jsonBodyMiddleware';

/////////////////////////////
// Convenience helpers     //
/////////////////////////////

const defaultDecoder = createDecoder();

/**
 * Decode one document with default options.
 *
 *   decode('[1, null, {"hoge": true}]')
 */
export function decode(source: string): JsonValue {
  return defaultDecoder.decode(source);
}

export function tryDecode(source: string): DecodeResult {
  return defaultDecoder.tryDecode(source);
}

/**
 * Tokenize with default options. Whitespace is not included.
 */
export function tokenize(source: string): Token[] {
  return defaultDecoder.tokenize(source);
}

/////////////////////////////
// Public exports          //
/////////////////////////////

// Decoder
export { createDecoder, normalizeDecoderOptions };
export type { Decoder, DecoderOptions, NormalizedDecoderOptions, DecodeResult };

// Stages
export { Lexer, Parser, parseTokens, Utf16Buffer };
export type { ParseOptions };

// Tokens
export {
  PUNCTUATION_TOKENS,
  createToken,
  describeToken,
  isPunctuationToken,
  isScalarToken,
};
export type {
  Token,
  TokenType,
  ScalarToken,
  PunctuationTokenType,
  StringToken,
  NumberToken,
  BoolToken,
  NullToken,
  WhiteSpaceToken,
  PunctuationToken,
};

// Values
export {
  SortedKeyMap,
  compareKeys,
  nullValue,
  boolValue,
  numberValue,
  stringValue,
  arrayValue,
  objectValue,
  isNullValue,
  isBoolValue,
  isNumberValue,
  isStringValue,
  isArrayValue,
  isObjectValue,
  valueEquals,
  toPlain,
  fromPlain,
};
export type {
  JsonValue,
  ValueType,
  PlainJson,
  NullValue,
  BoolValue,
  NumberValue,
  StringValue,
  ArrayValue,
  ObjectValue,
};

// Errors
export { DecodeError, isDecodeError, isLexError, isParseError };
export type { DecodeErrorCode, DecodeErrorOptions };

// Utilities: inspection
export { inspectValue, formatDecodeError, analyzeValue, inspectSource };
export type {
  InspectValueOptions,
  FormattedDecodeError,
  ValueInsight,
  InspectSourceOptions,
};

// Node integration
export { createJsonBodyMiddleware, isJsonBodyResult };
export type {
  JsonBodyRequest,
  JsonBodyResponse,
  JsonBodyResult,
  JsonBodyResponsePayload,
  JsonBodyMiddlewareOptions,
  NextFunction,
};
