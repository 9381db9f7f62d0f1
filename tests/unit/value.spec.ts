// tests/unit/value.spec.ts
//
// Unit tests for value tree helpers: constructors, guards, equality and
// plain JS interop.

import { describe, it, expect } from 'vitest';
import {
  arrayValue,
  boolValue,
  fromPlain,
  isArrayValue,
  isBoolValue,
  isNullValue,
  isNumberValue,
  isObjectValue,
  isStringValue,
  nullValue,
  numberValue,
  objectValue,
  stringValue,
  toPlain,
  valueEquals,
} from '../../src/core/value';
import type { PlainJson } from '../../src/core/value';

function asRecord(plain: PlainJson): { [key: string]: PlainJson } {
  if (plain === null || typeof plain !== 'object' || Array.isArray(plain)) {
    throw new Error('expected a plain object');
  }
  return plain;
}

describe('Values – guards', () => {
  it('narrows by type', () => {
    expect(isNullValue(nullValue())).toBe(true);
    expect(isBoolValue(boolValue(true))).toBe(true);
    expect(isNumberValue(numberValue(1))).toBe(true);
    expect(isStringValue(stringValue('a'))).toBe(true);
    expect(isArrayValue(arrayValue())).toBe(true);
    expect(isObjectValue(objectValue())).toBe(true);
    expect(isObjectValue(arrayValue())).toBe(false);
  });
});

describe('Values – equality', () => {
  it('compares objects by key, not by construction order', () => {
    const a = objectValue([
      ['x', numberValue(1)],
      ['y', arrayValue([nullValue()])],
    ]);
    const b = objectValue([
      ['y', arrayValue([nullValue()])],
      ['x', numberValue(1)],
    ]);
    expect(valueEquals(a, b)).toBe(true);
  });

  it('detects differences', () => {
    expect(valueEquals(numberValue(1), numberValue(2))).toBe(false);
    expect(valueEquals(nullValue(), boolValue(false))).toBe(false);
    expect(valueEquals(stringValue('1'), numberValue(1))).toBe(false);
    expect(
      valueEquals(arrayValue([numberValue(1)]), arrayValue([numberValue(1), nullValue()])),
    ).toBe(false);
    expect(
      valueEquals(
        objectValue([['a', nullValue()]]),
        objectValue([['b', nullValue()]]),
      ),
    ).toBe(false);
  });

  it('treats 0 and -0 as equal', () => {
    expect(valueEquals(numberValue(0), numberValue(-0))).toBe(true);
  });
});

describe('Values – toPlain', () => {
  it('converts a tree into plain data in key order', () => {
    const tree = objectValue([
      ['b', arrayValue([numberValue(1), boolValue(true), nullValue()])],
      ['a', stringValue('x')],
    ]);
    const plain = asRecord(toPlain(tree));

    expect(Object.keys(plain)).toEqual(['a', 'b']);
    expect(plain.a).toBe('x');
    expect(plain.b).toEqual([1, true, null]);
  });

  it('creates objects without a prototype', () => {
    const plain = asRecord(
      toPlain(objectValue([['__proto__', objectValue([['polluted', boolValue(true)]])]])),
    );

    expect(Object.getPrototypeOf(plain)).toBeNull();
    expect(Object.keys(plain)).toEqual(['__proto__']);
    expect(Reflect.get({}, 'polluted')).toBeUndefined();
  });
});

describe('Values – fromPlain', () => {
  it('builds a tree from plain data', () => {
    const tree = fromPlain({ b: [1, 'two', null], a: { c: false } });
    expect(
      valueEquals(
        tree,
        objectValue([
          ['a', objectValue([['c', boolValue(false)]])],
          ['b', arrayValue([numberValue(1), stringValue('two'), nullValue()])],
        ]),
      ),
    ).toBe(true);
  });

  it('accepts shared, non-cyclic references', () => {
    const shared = { x: 1 };
    const tree = fromPlain({ a: shared, b: shared });
    expect(isObjectValue(tree) && tree.entries.size).toBe(2);
  });

  it('rejects non-finite numbers', () => {
    expect(() => fromPlain(Number.NaN)).toThrowError(
      'jsondescent: non-finite number at <root> cannot be represented.',
    );
  });

  it('reports the path of unsupported values', () => {
    expect(() => fromPlain({ a: [1, undefined] })).toThrowError(
      'jsondescent: undefined at .a[1] cannot be represented.',
    );
    expect(() => fromPlain(() => 1)).toThrowError(
      'jsondescent: function at <root> cannot be represented.',
    );
  });

  it('rejects cycles', () => {
    const node: { [key: string]: unknown } = {};
    node.self = node;
    expect(() => fromPlain(node)).toThrowError(TypeError);
    expect(() => fromPlain(node)).toThrowError(
      'jsondescent: cyclic reference at .self cannot be represented.',
    );
  });
});
