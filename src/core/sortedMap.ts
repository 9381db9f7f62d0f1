/**
 * jsondescent – Key-ordered map
 *
 * Backing store for object values. Iteration always runs in lexicographic
 * key order (by Unicode code point), never in insertion order. Setting an
 * existing key replaces its value and leaves the order untouched.
 *
 * Bulk construction sorts once; `set` appends without searching when the
 * key sorts after every existing key. Building from entries is therefore
 * O(n log n) whatever order the keys arrive in.
 *
 * License: Apache-2.0
 */

/**
 * Compare two keys by Unicode code point.
 *
 * This differs from the default `<` on strings, which compares UTF-16 code
 * units: "\uFFFF" sorts before "\u{1F600}" here, but after it with `<`.
 */
export function compareKeys(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }

  if (i < a.length) return 1;
  if (j < b.length) return -1;
  return 0;
}

export class SortedKeyMap<V> implements Iterable<[string, V]> {
  private readonly items: Array<[string, V]> = [];

  /**
   * A repeated key keeps its last value.
   */
  constructor(entries?: Iterable<readonly [string, V]>) {
    if (!entries) return;

    const latest = new Map<string, V>();
    for (const [key, value] of entries) {
      latest.set(key, value);
    }

    const sorted = Array.from(latest).sort(([a], [b]) => compareKeys(a, b));
    for (const entry of sorted) {
      this.items.push(entry);
    }
  }

  get size(): number {
    return this.items.length;
  }

  has(key: string): boolean {
    return this.search(key).found;
  }

  get(key: string): V | undefined {
    const { index, found } = this.search(key);
    return found ? this.items[index][1] : undefined;
  }

  set(key: string, value: V): this {
    const last = this.items[this.items.length - 1];
    if (last === undefined || compareKeys(last[0], key) < 0) {
      this.items.push([key, value]);
      return this;
    }

    const { index, found } = this.search(key);
    if (found) {
      this.items[index][1] = value;
    } else {
      this.items.splice(index, 0, [key, value]);
    }
    return this;
  }

  delete(key: string): boolean {
    const { index, found } = this.search(key);
    if (found) this.items.splice(index, 1);
    return found;
  }

  keys(): string[] {
    return this.items.map(([key]) => key);
  }

  values(): V[] {
    return this.items.map(([, value]) => value);
  }

  entries(): Array<[string, V]> {
    return this.items.map(([key, value]): [string, V] => [key, value]);
  }

  [Symbol.iterator](): Iterator<[string, V]> {
    return this.entries()[Symbol.iterator]();
  }

  /**
   * Binary search. `index` is the key's slot when `found`, otherwise the
   * position where it would be inserted.
   */
  private search(key: string): { index: number; found: boolean } {
    let lo = 0;
    let hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const cmp = compareKeys(this.items[mid][0], key);
      if (cmp === 0) return { index: mid, found: true };
      if (cmp < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return { index: lo, found: false };
  }
}
