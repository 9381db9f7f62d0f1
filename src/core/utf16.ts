/**
 * jsondescent – UTF-16 escape buffer
 *
 * `\uXXXX` escapes inside a string literal produce UTF-16 code units, and a
 * character outside the BMP arrives as two of them (a surrogate pair). The
 * lexer collects consecutive units here and flushes them into the string
 * result before any other character is appended and at the closing quote.
 *
 * Contract:
 *  - `flush()` on an empty buffer returns "".
 *  - `flush()` throws a lex error on an unpaired or misordered surrogate.
 *  - The buffer is empty after every `flush()`, successful or not.
 *
 * License: Apache-2.0
 */

import { createInternalError, createLexError } from './errors';

export class Utf16Buffer {
  private units: number[] = [];

  get isEmpty(): boolean {
    return this.units.length === 0;
  }

  push(unit: number): void {
    if (!Number.isInteger(unit) || unit < 0 || unit > 0xffff) {
      throw createInternalError({
        message: `jsondescent: ${String(unit)} is not a UTF-16 code unit.`,
      });
    }
    this.units.push(unit);
  }

  flush(): string {
    if (this.units.length === 0) return '';

    const units = this.units;
    this.units = [];

    for (let i = 0; i < units.length; i++) {
      const unit = units[i];

      if (isHighSurrogate(unit)) {
        const low = units[i + 1];
        if (low === undefined || !isLowSurrogate(low)) {
          throw unpairedSurrogate(unit);
        }
        i++; // pair consumed
        continue;
      }

      if (isLowSurrogate(unit)) {
        throw unpairedSurrogate(unit);
      }
    }

    let out = '';
    for (let i = 0; i < units.length; i += CHUNK_SIZE) {
      out += String.fromCharCode(...units.slice(i, i + CHUNK_SIZE));
    }
    return out;
  }
}

// Keeps the spread below engine argument-count limits.
const CHUNK_SIZE = 4096;

export function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

export function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

function unpairedSurrogate(unit: number) {
  const hex = unit.toString(16).toUpperCase().padStart(4, '0');
  return createLexError({
    message: `jsondescent: invalid UTF-16 sequence (unpaired surrogate \\u${hex}).`,
  });
}
