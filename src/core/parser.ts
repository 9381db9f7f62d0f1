/**
 * jsondescent – Parser core
 *
 * Recursive-descent parser from a token list to a `JsonValue` tree. One
 * function per grammar production:
 *
 *   value  := object | array | String | Number | Bool | Null
 *   object := "{" "}" | "{" String ":" value ("," String ":" value)* "}"
 *   array  := "[" "]" | "[" value ("," value)* "]"
 *
 * `parse()` consumes exactly one value starting at the cursor and leaves
 * any remaining tokens alone. Callers that need "nothing after the
 * document" check `isAtEnd()` afterwards (the decoder facade does).
 *
 * Recursion depth follows nesting depth. Without `maxDepth`, pathological
 * nesting can exhaust the call stack.
 *
 * License: Apache-2.0
 */

import { createLimitError, createParseError } from './errors';
import { describeToken } from './tokens';
import type { Token } from './tokens';
import { SortedKeyMap } from './sortedMap';
import type { ArrayValue, JsonValue, ObjectValue } from './value';

/////////////////////
// Public API      //
/////////////////////

export interface ParseOptions {
  /**
   * Maximum container nesting. `0` admits scalars only, `1` admits `[1]`
   * but not `[[1]]`. Unlimited when omitted.
   */
  maxDepth?: number;
}

/**
 * Parse one value from a token list.
 *
 * Trailing tokens are ignored; use `Parser#isAtEnd()` to reject them.
 */
export function parseTokens(
  tokens: readonly Token[],
  options: ParseOptions = {},
): JsonValue {
  return new Parser(tokens, options).parse();
}

/////////////////////
// Parser class    //
/////////////////////

export class Parser {
  private readonly tokens: readonly Token[];
  private index = 0;
  private readonly maxDepth?: number;

  constructor(tokens: readonly Token[], options: ParseOptions = {}) {
    this.tokens = tokens;
    this.maxDepth =
      typeof options.maxDepth === 'number' && options.maxDepth >= 0
        ? options.maxDepth
        : undefined;
  }

  /**
   * Index of the next unconsumed token.
   */
  get position(): number {
    return this.index;
  }

  isAtEnd(): boolean {
    return this.index >= this.tokens.length;
  }

  /**
   * Parse the value starting at the cursor.
   */
  parse(): JsonValue {
    return this.parseValue(0);
  }

  /////////////////////////////
  // Productions             //
  /////////////////////////////

  /**
   * `depth` is the number of containers already open around this value.
   */
  private parseValue(depth: number): JsonValue {
    const tok = this.peek();

    switch (tok.type) {
      case 'LeftBrace':
        this.ensureDepth(depth + 1);
        return this.parseObject(depth + 1);
      case 'LeftBracket':
        this.ensureDepth(depth + 1);
        return this.parseArray(depth + 1);
      case 'String':
        this.next();
        return { type: 'String', value: tok.value };
      case 'Number':
        this.next();
        return { type: 'Number', value: tok.value };
      case 'Bool':
        this.next();
        return { type: 'Bool', value: tok.value };
      case 'Null':
        this.next();
        return { type: 'Null' };
      default:
        throw createParseError({
          message: `jsondescent: expected a value but found ${describeToken(tok)}.`,
        });
    }
  }

  private parseObject(depth: number): ObjectValue {
    this.next(); // '{'

    // Collected in arrival order and sorted once at the closing brace.
    const entries = new Map<string, JsonValue>();

    if (this.peek().type === 'RightBrace') {
      this.next();
      return { type: 'Object', entries: new SortedKeyMap(entries) };
    }

    for (;;) {
      const keyTok = this.next();
      if (keyTok.type !== 'String') {
        throw createParseError({
          message: `jsondescent: expected a string key in object but found ${describeToken(keyTok)}.`,
        });
      }

      const colon = this.next();
      if (colon.type !== 'Colon') {
        throw createParseError({
          message: `jsondescent: expected ":" after object key ${JSON.stringify(keyTok.value)} but found ${describeToken(colon)}.`,
        });
      }

      // Duplicate keys: last one wins.
      entries.set(keyTok.value, this.parseValue(depth));

      const sep = this.next();
      if (sep.type === 'RightBrace') {
        return { type: 'Object', entries: new SortedKeyMap(entries) };
      }
      if (sep.type !== 'Comma') {
        throw createParseError({
          message: `jsondescent: expected "," or "}" in object but found ${describeToken(sep)}.`,
        });
      }
    }
  }

  private parseArray(depth: number): ArrayValue {
    this.next(); // '['

    const elements: JsonValue[] = [];

    if (this.peek().type === 'RightBracket') {
      this.next();
      return { type: 'Array', elements };
    }

    for (;;) {
      elements.push(this.parseValue(depth));

      const sep = this.next();
      if (sep.type === 'RightBracket') {
        return { type: 'Array', elements };
      }
      if (sep.type !== 'Comma') {
        throw createParseError({
          message: `jsondescent: expected "," or "]" in array but found ${describeToken(sep)}.`,
        });
      }
    }
  }

  ///////////////////////////
  // Cursor & depth        //
  ///////////////////////////

  private peek(): Token {
    const tok = this.tokens[this.index];
    if (tok === undefined) {
      throw noTokenAvailable();
    }
    return tok;
  }

  private next(): Token {
    const tok = this.peek();
    this.index++;
    return tok;
  }

  private ensureDepth(depth: number): void {
    if (this.maxDepth !== undefined && depth > this.maxDepth) {
      throw createLimitError({
        message: `jsondescent: maximum nesting depth of ${this.maxDepth} exceeded.`,
      });
    }
  }
}

function noTokenAvailable() {
  return createParseError({
    message: 'jsondescent: unexpected end of input (no token available).',
  });
}
