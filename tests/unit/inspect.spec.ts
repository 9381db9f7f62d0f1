// tests/unit/inspect.spec.ts
//
// Unit tests for inspection helpers: value printing, error formatting and
// document summaries.

import { describe, it, expect } from 'vitest';
import {
  analyzeValue,
  formatDecodeError,
  inspectSource,
  inspectValue,
} from '../../src/utils/inspect';
import { createDecoder } from '../../src/core/decoder';
import { createLexError } from '../../src/core/errors';

const decoder = createDecoder();

describe('inspectValue', () => {
  it('prints scalars', () => {
    expect(inspectValue(decoder.decode('null'))).toBe('null');
    expect(inspectValue(decoder.decode('true'))).toBe('true');
    expect(inspectValue(decoder.decode('1.5'))).toBe('1.5');
    expect(inspectValue(decoder.decode('"a"'))).toBe('"a"');
  });

  it('prints nested containers with indentation', () => {
    expect(inspectValue(decoder.decode('{"a": [1, "x"]}'))).toBe(
      '{\n  "a": [\n    1,\n    "x"\n  ]\n}',
    );
  });

  it('prints empty containers inline', () => {
    expect(inspectValue(decoder.decode('[{}, []]'))).toBe('[\n  {},\n  []\n]');
  });

  it('collapses containers below maxDepth', () => {
    expect(
      inspectValue(decoder.decode('{"a": [1], "b": {"c": 1}}'), { maxDepth: 1 }),
    ).toBe('{\n  "a": [Array(1)],\n  "b": {… 1 key(s)}\n}');
  });

  it('truncates long arrays and objects', () => {
    expect(inspectValue(decoder.decode('[1, 2, 3, 4]'), { maxArrayLength: 2 })).toBe(
      '[\n  1,\n  2,\n  … 2 more item(s)\n]',
    );
    expect(
      inspectValue(decoder.decode('{"c": 3, "a": 1, "b": 2}'), { maxObjectKeys: 1 }),
    ).toBe('{\n  "a": 1,\n  … 2 more key(s)\n}');
  });

  it('truncates long strings', () => {
    expect(inspectValue(decoder.decode('"abcdef"'), { maxStringLength: 3 })).toBe(
      '"abc…"',
    );
  });

  it('never splits a surrogate pair when truncating', () => {
    const value = decoder.decode('"\\ud83d\\ude00x"');
    expect(inspectValue(value, { maxStringLength: 1 })).toBe('"\u{1F600}…"');
  });

  it('uses a custom indent', () => {
    expect(inspectValue(decoder.decode('[1]'), { indent: '\t' })).toBe('[\n\t1\n]');
  });
});

describe('formatDecodeError', () => {
  it('formats decode errors with their hint', () => {
    const err = createLexError({
      message: 'jsondescent: unexpected character "\'".',
      note: 'JSON strings use double quotes.',
    });
    const formatted = formatDecodeError(err);

    expect(formatted.summary).toBe('[E_LEX] jsondescent: unexpected character "\'".');
    expect(formatted.detail).toBe(
      '[E_LEX] jsondescent: unexpected character "\'".\n\nHint: JSON strings use double quotes.',
    );
    expect(formatted.error).toBe(err);
  });

  it('omits the hint when there is none', () => {
    const formatted = formatDecodeError(createLexError({ message: 'jsondescent: x.' }));
    expect(formatted.detail).toBe('[E_LEX] jsondescent: x.');
  });

  it('formats other thrown values', () => {
    expect(formatDecodeError(new Error('boom')).summary).toBe('Error: boom');
    expect(formatDecodeError('plain').detail).toBe('Error: plain');
  });
});

describe('analyzeValue', () => {
  it('summarizes a document', () => {
    const insight = analyzeValue(decoder.decode('{"b": [1, {"a": null}], "c": true}'));

    expect(insight.nodeCount).toBe(6);
    expect(insight.maxDepth).toBe(4);
    expect(insight.keys).toEqual(['a', 'b', 'c']);
    expect(insight.counts).toEqual({
      Null: 1,
      Bool: 1,
      Number: 1,
      String: 0,
      Array: 1,
      Object: 2,
    });
  });

  it('lists repeated keys once', () => {
    const insight = analyzeValue(decoder.decode('[{"k": 1}, {"k": 2}]'));
    expect(insight.keys).toEqual(['k']);
    expect(insight.maxDepth).toBe(3);
  });
});

describe('inspectSource', () => {
  it('reports a decoded document', () => {
    const lines = inspectSource('[1]').split('\n');

    expect(lines[0]).toBe('jsondescent: decoded document');
    expect(lines.slice(2)).toEqual([
      'Root: Array',
      'Nodes: 2',
      'Depth: 2',
      'Keys: —',
      '',
      '[',
      '  1',
      ']',
    ]);
  });

  it('reports a failure', () => {
    const lines = inspectSource('[1,').split('\n');

    expect(lines[0]).toBe('jsondescent: failed to decode document');
    expect(lines.slice(2)).toEqual([
      'Source: "[1,"',
      '',
      '[E_PARSE] jsondescent: unexpected end of input (no token available).',
    ]);
  });

  it('cuts the source preview on a character boundary', () => {
    const source = '"' + '\u{1F600}'.repeat(100);
    const lines = inspectSource(source).split('\n');

    expect(lines[2]).toBe('Source: "\\"' + '\u{1F600}'.repeat(79) + '…"');
  });

  it('uses the given decoder options', () => {
    const report = inspectSource('[1]', { decoderOptions: { maxDepth: 0 } });
    expect(report.split('\n')[4]).toBe(
      '[E_LIMIT] jsondescent: maximum nesting depth of 0 exceeded.',
    );
  });

  it('passes print options through', () => {
    const report = inspectSource('{"a": 1}', { decoder, indent: '    ' });
    expect(report.split('\n').slice(-3)).toEqual(['{', '    "a": 1', '}']);
  });
});
