/**
 * jsondescent – Value tree types
 *
 * The decoded document is a tree of `JsonValue` nodes discriminated by
 * `type`. Trees are built bottom-up by the parser, so they are acyclic and
 * every node belongs to exactly one parent.
 *
 *  - Every JSON number (integer or fractional) is a `Number` node holding
 *    a double.
 *  - `Object` entries live in a `SortedKeyMap`: iteration is lexicographic
 *    by key, and a repeated key keeps the last value.
 *
 * License: Apache-2.0
 */

import { SortedKeyMap } from './sortedMap';

/////////////////////////
// Node shapes         //
/////////////////////////

export type ValueType = 'Null' | 'Bool' | 'Number' | 'String' | 'Array' | 'Object';

export interface NullValue {
  type: 'Null';
}

export interface BoolValue {
  type: 'Bool';
  value: boolean;
}

export interface NumberValue {
  type: 'Number';
  value: number;
}

export interface StringValue {
  type: 'String';
  value: string;
}

export interface ArrayValue {
  type: 'Array';
  elements: JsonValue[];
}

export interface ObjectValue {
  type: 'Object';
  entries: SortedKeyMap<JsonValue>;
}

export type JsonValue =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | ArrayValue
  | ObjectValue;

/**
 * Plain JS representation of a value tree.
 */
export type PlainJson =
  | null
  | boolean
  | number
  | string
  | PlainJson[]
  | { [key: string]: PlainJson };

/////////////////////////
// Constructors        //
/////////////////////////

export function nullValue(): NullValue {
  return { type: 'Null' };
}

export function boolValue(value: boolean): BoolValue {
  return { type: 'Bool', value };
}

export function numberValue(value: number): NumberValue {
  return { type: 'Number', value };
}

export function stringValue(value: string): StringValue {
  return { type: 'String', value };
}

export function arrayValue(elements: JsonValue[] = []): ArrayValue {
  return { type: 'Array', elements };
}

/**
 * Build an object node. Later entries overwrite earlier ones with the same key.
 */
export function objectValue(
  entries: Iterable<readonly [string, JsonValue]> = [],
): ObjectValue {
  return { type: 'Object', entries: new SortedKeyMap(entries) };
}

/////////////////////////
// Type guards         //
/////////////////////////

export function isNullValue(value: JsonValue): value is NullValue {
  return value.type === 'Null';
}

export function isBoolValue(value: JsonValue): value is BoolValue {
  return value.type === 'Bool';
}

export function isNumberValue(value: JsonValue): value is NumberValue {
  return value.type === 'Number';
}

export function isStringValue(value: JsonValue): value is StringValue {
  return value.type === 'String';
}

export function isArrayValue(value: JsonValue): value is ArrayValue {
  return value.type === 'Array';
}

export function isObjectValue(value: JsonValue): value is ObjectValue {
  return value.type === 'Object';
}

/////////////////////////
// Comparison          //
/////////////////////////

/**
 * Deep structural equality. Object entries are compared by key, so two
 * objects built in different insertion orders are equal.
 */
export function valueEquals(a: JsonValue, b: JsonValue): boolean {
  switch (a.type) {
    case 'Null':
      return b.type === 'Null';
    case 'Bool':
      return b.type === 'Bool' && b.value === a.value;
    case 'Number':
      return b.type === 'Number' && b.value === a.value;
    case 'String':
      return b.type === 'String' && b.value === a.value;
    case 'Array': {
      if (b.type !== 'Array') return false;
      if (a.elements.length !== b.elements.length) return false;
      return a.elements.every((el, i) => valueEquals(el, b.elements[i]));
    }
    case 'Object': {
      if (b.type !== 'Object') return false;
      if (a.entries.size !== b.entries.size) return false;
      for (const [key, av] of a.entries) {
        const bv = b.entries.get(key);
        if (bv === undefined || !valueEquals(av, bv)) return false;
      }
      return true;
    }
    default: {
      const _never: never = a;
      return _never;
    }
  }
}

/////////////////////////
// Plain JS interop    //
/////////////////////////

/**
 * Convert a value tree into plain JS data.
 *
 * Objects are created without a prototype, so a `"__proto__"` key becomes
 * an ordinary own property. Keys are inserted in the tree's sorted order.
 */
export function toPlain(value: JsonValue): PlainJson {
  switch (value.type) {
    case 'Null':
      return null;
    case 'Bool':
    case 'Number':
    case 'String':
      return value.value;
    case 'Array':
      return value.elements.map(toPlain);
    case 'Object': {
      const out: { [key: string]: PlainJson } = Object.create(null);
      for (const [key, child] of value.entries) {
        out[key] = toPlain(child);
      }
      return out;
    }
    default: {
      const _never: never = value;
      return _never;
    }
  }
}

/**
 * Build a value tree from plain JS data.
 *
 * Accepts null, booleans, finite numbers, strings, arrays and plain objects.
 * Anything else (undefined, functions, NaN, cycles, …) throws a TypeError.
 */
export function fromPlain(input: unknown): JsonValue {
  const ancestors = new Set<object>();

  function convert(val: unknown, path: string): JsonValue {
    const at = path || '<root>';

    if (typeof val === 'boolean') return boolValue(val);
    if (typeof val === 'string') return stringValue(val);
    if (typeof val === 'number') {
      if (!Number.isFinite(val)) {
        throw new TypeError(
          `jsondescent: non-finite number at ${at} cannot be represented.`,
        );
      }
      return numberValue(val);
    }
    if (typeof val !== 'object') {
      throw new TypeError(`jsondescent: ${typeof val} at ${at} cannot be represented.`);
    }
    if (val === null) return nullValue();

    if (ancestors.has(val)) {
      throw new TypeError(
        `jsondescent: cyclic reference at ${at} cannot be represented.`,
      );
    }

    ancestors.add(val);
    try {
      if (Array.isArray(val)) {
        return arrayValue(val.map((el, i) => convert(el, `${path}[${i}]`)));
      }

      const entries: Array<[string, JsonValue]> = [];
      for (const [key, child] of Object.entries(val)) {
        entries.push([key, convert(child, `${path}.${key}`)]);
      }
      return objectValue(entries);
    } finally {
      ancestors.delete(val);
    }
  }

  return convert(input, '');
}
