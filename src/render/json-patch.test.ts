import { describe, it, expect } from 'vitest';
import { applyJsonPatch, isOperation, toOperations } from './json-patch.js';
import { isCoreError } from '../core/core-error.js';

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
  } catch (err) {
    return isCoreError(err) ? err.code : null;
  }
  return null;
}

describe('isOperation', () => {
  it('checks the fields each op needs', () => {
    expect(isOperation({ op: 'add', path: '/a', value: 1 })).toBe(true);
    expect(isOperation({ op: 'add', path: '/a' })).toBe(false);
    expect(isOperation({ op: 'remove', path: '/a' })).toBe(true);
    expect(isOperation({ op: 'move', path: '/a', from: '/b' })).toBe(true);
    expect(isOperation({ op: 'copy', path: '/a' })).toBe(false);
    expect(isOperation({ op: 'frobnicate', path: '/a' })).toBe(false);
    expect(isOperation(['add'])).toBe(false);
  });
});

describe('toOperations', () => {
  it('names the first malformed entry', () => {
    expect(() => toOperations([{ op: 'remove', path: '/a' }, { op: 'add' }])).toThrow(
      'patch operation 1 is malformed',
    );
  });
});

describe('applyJsonPatch', () => {
  it('applies operations in order', () => {
    const result = applyJsonPatch({ n: 1, s: 'a' }, [
      { op: 'replace', path: '/n', value: 2 },
      { op: 'add', path: '/list', value: [] },
      { op: 'add', path: '/list/-', value: 'x' },
    ]);
    expect(result).toEqual({ n: 2, s: 'a', list: ['x'] });
  });

  it('leaves the input untouched', () => {
    const doc = { a: { b: 1 } };
    applyJsonPatch(doc, [{ op: 'replace', path: '/a/b', value: 2 }]);
    expect(doc).toEqual({ a: { b: 1 } });
  });

  it('fails with JSON_PATCH when an operation cannot apply', () => {
    expect(codeOf(() => applyJsonPatch({ a: 1 }, [{ op: 'remove', path: '/missing' }]))).toBe(
      'JSON_PATCH',
    );
  });

  it('fails with JSON_PATCH when a test operation does not hold', () => {
    expect(codeOf(() => applyJsonPatch({ a: 1 }, [{ op: 'test', path: '/a', value: 2 }]))).toBe(
      'JSON_PATCH',
    );
  });
});
