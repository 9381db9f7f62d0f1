/**
 * jsondescent – Decoder facade
 *
 * Bridges raw source text and the lexer / parser, and applies the
 * configured limits. It does not tokenize or parse anything itself.
 *
 * License: Apache-2.0
 */

import {
  createLimitError,
  createParseError,
  isDecodeError,
} from './errors';
import type { DecodeError } from './errors';
import { Lexer } from './lexer';
import { Parser } from './parser';
import { describeToken } from './tokens';
import type { Token } from './tokens';
import type { JsonValue } from './value';

//////////////////////
// Public interfaces //
//////////////////////

/**
 * Decoder-level options. All are optional.
 */
export interface DecoderOptions {
  /**
   * Maximum source length in UTF-16 code units. Longer inputs are rejected
   * with `E_LIMIT` before lexing starts.
   */
  maxInputLength?: number;

  /**
   * Maximum container nesting, forwarded to the parser.
   */
  maxDepth?: number;

  /**
   * Accept tokens after the root value (they are ignored).
   * Default: false.
   */
  allowTrailingTokens?: boolean;
}

/**
 * Options with defaults applied.
 */
export interface NormalizedDecoderOptions {
  maxInputLength?: number;
  maxDepth?: number;
  allowTrailingTokens: boolean;
}

export type DecodeResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: DecodeError };

/**
 * Immutable decoder; `withOptions` returns a new instance.
 */
export interface Decoder {
  readonly options: NormalizedDecoderOptions;

  /**
   * Tokenize without parsing. Length limits still apply.
   */
  tokenize(source: string): Token[];

  /**
   * Decode one JSON document.
   *
   * Throws DecodeError (E_LEX / E_PARSE / E_LIMIT).
   */
  decode(source: string): JsonValue;

  /**
   * Like `decode`, but returns decode failures as a value. Errors that are
   * not DecodeErrors (e.g. a stack overflow) are rethrown.
   */
  tryDecode(source: string): DecodeResult;

  withOptions(overrides: DecoderOptions): Decoder;
}

//////////////////////////////
// Default options & helpers //
//////////////////////////////

const DEFAULT_OPTIONS: NormalizedDecoderOptions = {
  maxInputLength: undefined,
  maxDepth: undefined,
  allowTrailingTokens: false,
};

function normalizeLimit(value: number | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
    ? value
    : undefined;
}

/**
 * Merge user options with defaults. Negative or non-finite limits are
 * treated as unset.
 */
export function normalizeDecoderOptions(
  opts?: DecoderOptions,
): NormalizedDecoderOptions {
  if (!opts) {
    return { ...DEFAULT_OPTIONS };
  }

  return {
    maxInputLength: normalizeLimit(opts.maxInputLength),
    maxDepth: normalizeLimit(opts.maxDepth),
    allowTrailingTokens:
      typeof opts.allowTrailingTokens === 'boolean'
        ? opts.allowTrailingTokens
        : DEFAULT_OPTIONS.allowTrailingTokens,
  };
}

///////////////////////////////
// Decoder implementation    //
///////////////////////////////

class DecoderImpl implements Decoder {
  public readonly options: NormalizedDecoderOptions;

  constructor(options: NormalizedDecoderOptions) {
    this.options = options;
  }

  tokenize(source: string): Token[] {
    this.ensureSource(source);
    return new Lexer(source).tokenize();
  }

  decode(source: string): JsonValue {
    const tokens = this.tokenize(source);

    const parser = new Parser(tokens, { maxDepth: this.options.maxDepth });
    const value = parser.parse();

    if (!this.options.allowTrailingTokens && !parser.isAtEnd()) {
      const extra = tokens[parser.position];
      throw createParseError({
        message: `jsondescent: unexpected ${describeToken(extra)} after the end of the document.`,
      });
    }

    return value;
  }

  tryDecode(source: string): DecodeResult {
    try {
      return { ok: true, value: this.decode(source) };
    } catch (err) {
      if (isDecodeError(err)) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  withOptions(overrides: DecoderOptions): Decoder {
    return new DecoderImpl(
      normalizeDecoderOptions({ ...this.options, ...overrides }),
    );
  }

  private ensureSource(source: string): void {
    if (typeof source !== 'string') {
      throw new TypeError('jsondescent: source must be a string.');
    }

    const max = this.options.maxInputLength;
    if (max !== undefined && source.length > max) {
      throw createLimitError({
        message: `jsondescent: input length ${source.length} exceeds the maximum of ${max}.`,
      });
    }
  }
}

////////////////////////
// Public entry point //
////////////////////////

/**
 * Create a decoder.
 *
 * ```ts
 * const decoder = createDecoder({ maxDepth: 64 });
 * const value = decoder.decode('{"a": [1, 2]}');
 * ```
 */
export function createDecoder(options?: DecoderOptions): Decoder {
  return new DecoderImpl(normalizeDecoderOptions(options));
}
