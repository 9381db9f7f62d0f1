// tests/security/prototype-pollution.spec.ts
//
// Keys such as "__proto__" and "constructor" are ordinary data: they must
// not reach Object.prototype through decoding, conversion or the middleware.

import { describe, it, expect, afterEach } from 'vitest';
import { decode, toPlain } from '../../src';
import { createJsonBodyMiddleware } from '../../src/integrations/node/jsonBodyMiddleware';
import type { JsonBodyRequest } from '../../src/integrations/node/jsonBodyMiddleware';

const HOSTILE =
  '{"__proto__": {"polluted": true}, "constructor": {"prototype": {"polluted": true}}}';

function isPolluted(): boolean {
  return Reflect.get({}, 'polluted') !== undefined;
}

afterEach(() => {
  Reflect.deleteProperty(Object.prototype, 'polluted');
});

describe('Prototype pollution – value tree', () => {
  it('stores hostile keys as ordinary entries', () => {
    const value = decode(HOSTILE);
    if (value.type !== 'Object') throw new Error('expected an object');

    expect(value.entries.keys()).toEqual(['__proto__', 'constructor']);
    expect(isPolluted()).toBe(false);
  });

  it('does not resolve inherited names as keys', () => {
    const value = decode('{"a": 1}');
    if (value.type !== 'Object') throw new Error('expected an object');

    expect(value.entries.get('toString')).toBeUndefined();
    expect(value.entries.has('hasOwnProperty')).toBe(false);
    expect(value.entries.get('__proto__')).toBeUndefined();
  });
});

describe('Prototype pollution – toPlain', () => {
  it('keeps "__proto__" as an own property', () => {
    const plain = toPlain(decode(HOSTILE));
    if (plain === null || typeof plain !== 'object' || Array.isArray(plain)) {
      throw new Error('expected a plain object');
    }

    expect(Object.getPrototypeOf(plain)).toBeNull();
    expect(Object.keys(plain)).toEqual(['__proto__', 'constructor']);
    expect(Object.getOwnPropertyDescriptor(plain, '__proto__')?.value).toEqual({
      polluted: true,
    });
    expect(isPolluted()).toBe(false);
  });
});

describe('Prototype pollution – middleware', () => {
  it('decodes hostile bodies without touching prototypes', async () => {
    const middleware = createJsonBodyMiddleware<JsonBodyRequest>();
    let sent: unknown;

    await middleware(
      { method: 'POST', body: HOSTILE },
      {
        status() {
          return undefined;
        },
        json(body: unknown) {
          sent = body;
        },
      },
    );

    expect(isPolluted()).toBe(false);
    expect(JSON.stringify(sent)).toBe(
      '{"ok":true,"result":{"__proto__":{"polluted":true},"constructor":{"prototype":{"polluted":true}}}}',
    );
  });
});
