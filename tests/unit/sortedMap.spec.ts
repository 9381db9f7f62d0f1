// tests/unit/sortedMap.spec.ts
//
// Unit tests for the key-ordered map behind object values.

import { describe, it, expect } from 'vitest';
import { SortedKeyMap, compareKeys } from '../../src/core/sortedMap';

describe('compareKeys', () => {
  it('orders by code point', () => {
    expect(compareKeys('a', 'b')).toBe(-1);
    expect(compareKeys('b', 'a')).toBe(1);
    expect(compareKeys('B', 'a')).toBe(-1);
    expect(compareKeys('same', 'same')).toBe(0);
  });

  it('puts prefixes first', () => {
    expect(compareKeys('a', 'ab')).toBe(-1);
    expect(compareKeys('ab', 'a')).toBe(1);
    expect(compareKeys('', 'a')).toBe(-1);
  });

  it('compares astral characters by code point, not code unit', () => {
    expect(compareKeys('\uFFFF', '\u{1F600}')).toBe(-1);
    expect('\u{1F600}' < '\uFFFF').toBe(true);
  });
});

describe('SortedKeyMap', () => {
  it('iterates in key order regardless of insertion order', () => {
    const map = new SortedKeyMap<number>([
      ['togatoga', 1],
      ['fugafuga', 2],
      ['hoge', 3],
    ]);
    expect(map.keys()).toEqual(['fugafuga', 'hoge', 'togatoga']);
    expect(map.values()).toEqual([2, 3, 1]);
    expect([...map]).toEqual([
      ['fugafuga', 2],
      ['hoge', 3],
      ['togatoga', 1],
    ]);
  });

  it('replaces the value of an existing key', () => {
    const map = new SortedKeyMap<string>();
    map.set('b', 'first').set('a', 'x').set('b', 'second');
    expect(map.size).toBe(2);
    expect(map.get('b')).toBe('second');
    expect(map.keys()).toEqual(['a', 'b']);
  });

  it('keeps the last value for a key repeated at construction', () => {
    const map = new SortedKeyMap<number>([
      ['b', 1],
      ['a', 2],
      ['b', 3],
    ]);
    expect(map.entries()).toEqual([
      ['a', 2],
      ['b', 3],
    ]);
  });

  it('keeps order when a smaller key follows ascending inserts', () => {
    const map = new SortedKeyMap<number>();
    map.set('a', 1).set('c', 3).set('d', 4).set('b', 2).set('e', 5);
    expect(map.keys()).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(map.get('b')).toBe(2);
  });

  it('answers lookups', () => {
    const map = new SortedKeyMap<number>([['a', 1]]);
    expect(map.has('a')).toBe(true);
    expect(map.has('z')).toBe(false);
    expect(map.get('z')).toBeUndefined();
  });

  it('deletes keys', () => {
    const map = new SortedKeyMap<number>([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);
    expect(map.delete('b')).toBe(true);
    expect(map.delete('b')).toBe(false);
    expect(map.keys()).toEqual(['a', 'c']);
  });

  it('hands out copies of its entries', () => {
    const map = new SortedKeyMap<number>([['a', 1]]);
    const entries = map.entries();
    entries[0][1] = 99;
    entries.push(['b', 2]);
    expect(map.get('a')).toBe(1);
    expect(map.size).toBe(1);
  });
});
