/**
 * jsondescent – Utils / inspect
 *
 * Convenience helpers for:
 *  - Pretty-printing value trees (for logs / debug UIs).
 *  - Formatting decode errors.
 *  - Summarizing a decoded document (node count, depth, keys).
 *
 * License: Apache-2.0
 */

import { createDecoder } from '../core/decoder';
import type { Decoder, DecoderOptions } from '../core/decoder';
import { isDecodeError } from '../core/errors';
import { compareKeys } from '../core/sortedMap';
import type { JsonValue, ValueType } from '../core/value';

/////////////////////////////
// Value inspection        //
/////////////////////////////

export interface InspectValueOptions {
  /**
   * Maximum depth for object/array traversal.
   * Default: 3
   */
  maxDepth?: number;

  /**
   * Maximum number of array elements to display per level.
   * Default: 10
   */
  maxArrayLength?: number;

  /**
   * Maximum number of object keys to display per level.
   * Default: 10
   */
  maxObjectKeys?: number;

  /**
   * Maximum number of characters for strings.
   * Longer strings are truncated with "…".
   * Default: 80
   */
  maxStringLength?: number;

  /**
   * Default: '  ' (two spaces)
   */
  indent?: string;
}

/**
 * Pretty-print a value tree. Deep or large structures are truncated.
 *
 *   inspectValue(decode('{"a": [1, "x"]}'))
 *
 *   {
 *     "a": [
 *       1,
 *       "x"
 *     ]
 *   }
 */
export function inspectValue(
  value: JsonValue,
  options: InspectValueOptions = {},
): string {
  const {
    maxDepth = 3,
    maxArrayLength = 10,
    maxObjectKeys = 10,
    maxStringLength = 80,
    indent = '  ',
  } = options;

  function format(val: JsonValue, depth: number): string {
    switch (val.type) {
      case 'Null':
        return 'null';
      case 'Bool':
      case 'Number':
        return String(val.value);
      case 'String': {
        return JSON.stringify(truncate(val.value, maxStringLength));
      }
      case 'Array': {
        const elements = val.elements;
        if (elements.length === 0) return '[]';
        if (depth >= maxDepth) return `[Array(${elements.length})]`;

        const items: string[] = [];
        const len = Math.min(elements.length, maxArrayLength);
        for (let i = 0; i < len; i++) {
          items.push(indent.repeat(depth + 1) + format(elements[i], depth + 1));
        }
        if (elements.length > len) {
          items.push(
            indent.repeat(depth + 1) + `… ${elements.length - len} more item(s)`,
          );
        }

        return `[\n${items.join(',\n')}\n${indent.repeat(depth)}]`;
      }
      case 'Object': {
        const entries = val.entries.entries();
        if (entries.length === 0) return '{}';
        if (depth >= maxDepth) return `{… ${entries.length} key(s)}`;

        const lines: string[] = [];
        const len = Math.min(entries.length, maxObjectKeys);
        for (let i = 0; i < len; i++) {
          const [key, child] = entries[i];
          lines.push(
            `${indent.repeat(depth + 1)}${JSON.stringify(key)}: ${format(child, depth + 1)}`,
          );
        }
        if (entries.length > len) {
          lines.push(
            indent.repeat(depth + 1) + `… ${entries.length - len} more key(s)`,
          );
        }

        return `{\n${lines.join(',\n')}\n${indent.repeat(depth)}}`;
      }
      default: {
        const _never: never = val;
        return _never;
      }
    }
  }

  return format(value, 0);
}

/**
 * Cut to `max` code points, so a surrogate pair is never split.
 */
function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  const chars = Array.from(s);
  return chars.length > max ? chars.slice(0, max).join('') + '…' : s;
}

/////////////////////////////
// Error formatting        //
/////////////////////////////

export interface FormattedDecodeError {
  /**
   * Compact single-line summary.
   */
  summary: string;

  /**
   * Summary plus the hint, if any.
   */
  detail: string;

  /**
   * Raw error (DecodeError or unknown).
   */
  error: unknown;
}

/**
 * Format a decode error (or any thrown value) for logs and UIs.
 *
 *   [E_LEX] jsondescent: unexpected character "'".
 *
 *   Hint: JSON strings use double quotes.
 */
export function formatDecodeError(err: unknown): FormattedDecodeError {
  if (!isDecodeError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    const summary = `Error: ${message}`;
    return { summary, detail: summary, error: err };
  }

  const summary = `[${err.code}] ${err.message}`;
  let detail = summary;

  if (err.note && err.note.trim() !== '') {
    detail += `\n\nHint: ${err.note}`;
  }

  return { summary, detail, error: err };
}

/////////////////////////////
// Document introspection  //
/////////////////////////////

export interface ValueInsight {
  /**
   * Total number of nodes, containers included.
   */
  nodeCount: number;

  /**
   * Maximum tree depth (root = 1).
   */
  maxDepth: number;

  /**
   * Every object key found anywhere in the tree. Sorted, unique.
   */
  keys: string[];

  /**
   * Node count per value type.
   */
  counts: Record<ValueType, number>;
}

export function analyzeValue(root: JsonValue): ValueInsight {
  let nodeCount = 0;
  let maxDepth = 0;
  const keys = new Set<string>();
  const counts: Record<ValueType, number> = {
    Null: 0,
    Bool: 0,
    Number: 0,
    String: 0,
    Array: 0,
    Object: 0,
  };

  function visit(node: JsonValue, depth: number): void {
    nodeCount++;
    counts[node.type]++;
    if (depth > maxDepth) maxDepth = depth;

    if (node.type === 'Array') {
      for (const el of node.elements) {
        visit(el, depth + 1);
      }
    } else if (node.type === 'Object') {
      for (const [key, child] of node.entries) {
        keys.add(key);
        visit(child, depth + 1);
      }
    }
  }

  visit(root, 1);

  return {
    nodeCount,
    maxDepth,
    keys: Array.from(keys).sort(compareKeys),
    counts,
  };
}

/////////////////////////////
// High-level source helper //
/////////////////////////////

export interface InspectSourceOptions extends InspectValueOptions {
  /**
   * Decoder to use. If omitted, one is created from `decoderOptions`.
   */
  decoder?: Decoder;

  decoderOptions?: DecoderOptions;
}

/**
 * Decode a document and return a human-readable report: a summary of the
 * tree followed by a truncated preview, or the formatted failure.
 */
export function inspectSource(
  source: string,
  options: InspectSourceOptions = {},
): string {
  const { decoder: providedDecoder, decoderOptions, ...valueOptions } = options;
  const decoder = providedDecoder ?? createDecoder(decoderOptions);

  const result = decoder.tryDecode(source);

  if (!result.ok) {
    const formatted = formatDecodeError(result.error);
    const preview = truncate(source, 80);
    return [
      'jsondescent: failed to decode document',
      '──────────────────────────────────────',
      `Source: ${JSON.stringify(preview)}`,
      '',
      formatted.detail,
    ].join('\n');
  }

  const insight = analyzeValue(result.value);

  return [
    'jsondescent: decoded document',
    '─────────────────────────────',
    `Root: ${result.value.type}`,
    `Nodes: ${insight.nodeCount}`,
    `Depth: ${insight.maxDepth}`,
    `Keys: ${insight.keys.length ? insight.keys.join(', ') : '—'}`,
    '',
    inspectValue(result.value, valueOptions),
  ].join('\n');
}
