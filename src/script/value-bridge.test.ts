import { describe, it, expect } from 'vitest';
import vm from 'node:vm';
import { fromScriptValue, toScriptValue } from './value-bridge.js';
import { isCoreError } from '../core/core-error.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { setOwn } from '../types/json.js';

function contextParse(): (text: string) => unknown {
  const parse: unknown = vm.runInContext('JSON.parse', vm.createContext({}));
  if (typeof parse !== 'function') throw new Error('no JSON.parse');
  return (text) => {
    const value: unknown = parse(text);
    return value;
  };
}

function conversionCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isCoreError(err) ? err.code : 'OTHER';
  }
  return undefined;
}

describe('toScriptValue / fromScriptValue', () => {
  it('round-trips JSON-compatible values', () => {
    const parse = contextParse();
    const value: JsonValue = {
      n: null,
      b: true,
      i: 9007199254740991,
      neg: -9007199254740991,
      f: 0.5,
      s: 'héllo',
      a: [1, 'two', [3], { four: 4 }],
      o: { nested: { deep: [] } },
    };

    expect(fromScriptValue(toScriptValue(value, parse))).toEqual(value);
  });

  it('keeps a __proto__ key as an ordinary property', () => {
    const value: JsonObject = {};
    setOwn(value, '__proto__', { a: 1 });
    setOwn(value, 'b', 2);

    const result = fromScriptValue(toScriptValue(value, contextParse()));

    expect(JSON.stringify(result)).toBe('{"__proto__":{"a":1},"b":2}');
  });

  it('materializes objects in the engine realm', () => {
    const parse = contextParse();
    const value = toScriptValue({ a: [1] }, parse);

    expect(value).not.toBeInstanceOf(Object);
    expect(fromScriptValue(value)).toEqual({ a: [1] });
  });
});

describe('fromScriptValue', () => {
  it('maps non-finite numbers to null', () => {
    expect(fromScriptValue([NaN, Infinity, -Infinity, 1])).toEqual([null, null, null, 1]);
  });

  it('omits undefined and functions in objects and nulls them in arrays', () => {
    expect(fromScriptValue({ a: undefined, f: () => 1, k: 1 })).toEqual({ k: 1 });
    expect(fromScriptValue([undefined, () => 1, Symbol('s')])).toEqual([null, null, null]);
  });

  it('returns null for a top-level undefined', () => {
    expect(fromScriptValue(undefined)).toBeNull();
  });

  it('honors toJSON', () => {
    expect(fromScriptValue({ when: new Date('2026-01-02T03:04:05.000Z') })).toEqual({
      when: '2026-01-02T03:04:05.000Z',
    });
  });

  it('allows shared references that are not cycles', () => {
    const shared = { x: 1 };
    expect(fromScriptValue({ a: shared, b: shared })).toEqual({ a: { x: 1 }, b: { x: 1 } });
  });

  it('rejects cycles with CONVERSION', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;
    expect(conversionCode(() => fromScriptValue(cyclic))).toBe('CONVERSION');
  });

  it('rejects BigInt with CONVERSION', () => {
    expect(conversionCode(() => fromScriptValue({ big: 10n }))).toBe('CONVERSION');
  });

  it('rejects promises with CONVERSION', () => {
    expect(conversionCode(() => fromScriptValue(Promise.resolve(1)))).toBe('CONVERSION');
  });

  it('names the path of the offending value', () => {
    expect(() => fromScriptValue({ list: [1, { big: 1n }] })).toThrow('$.list[1].big');
  });

  it('wraps throwing getters as CONVERSION', () => {
    const value = {
      get broken(): number {
        throw new Error('getter failed');
      },
    };
    expect(() => fromScriptValue(value)).toThrow('value could not be read: getter failed');
  });
});
