import { describe, it, expect } from 'vitest';
import {
  canonicalHeaderName,
  normalizeRequestHeaders,
  setHeader,
  appendHeader,
  removeHeader,
  hasHeader,
  assertHeaderValue,
} from './headers.js';
import { isCoreError } from './core-error.js';

describe('canonicalHeaderName', () => {
  it('capitalizes each hyphenated segment', () => {
    expect(canonicalHeaderName('content-type')).toBe('Content-Type');
    expect(canonicalHeaderName('X-API-KEY')).toBe('X-Api-Key');
    expect(canonicalHeaderName('etag')).toBe('Etag');
  });
});

describe('normalizeRequestHeaders', () => {
  it('canonicalizes names and joins multiple values', () => {
    expect(
      normalizeRequestHeaders({
        'accept-language': 'en',
        'x-forwarded-for': ['10.0.0.1', '10.0.0.2'],
        skipped: undefined,
      }),
    ).toEqual({
      'Accept-Language': 'en',
      'X-Forwarded-For': '10.0.0.1, 10.0.0.2',
    });
  });

  it('keeps a __proto__ header as an own key', () => {
    const headers = normalizeRequestHeaders({ ['__proto__']: 'x', host: 'example.test' });
    expect(Object.keys(headers)).toEqual(['__proto__', 'Host']);
    expect(Object.getOwnPropertyDescriptor(headers, '__proto__')?.value).toBe('x');
  });

  it('merges names that collide after canonicalization', () => {
    expect(normalizeRequestHeaders({ via: 'a', VIA: 'b' })).toEqual({ Via: 'a, b' });
  });
});

describe('response header operations', () => {
  it('set replaces all values', () => {
    const headers = setHeader({ 'X-Tag': ['a', 'b'] }, 'x-tag', 'c');
    expect(headers).toEqual({ 'X-Tag': ['c'] });
  });

  it('append adds a parallel value', () => {
    const headers = appendHeader(setHeader({}, 'Vary', 'Accept'), 'vary', 'Cookie');
    expect(headers).toEqual({ Vary: ['Accept', 'Cookie'] });
  });

  it('remove deletes every value and leaves others alone', () => {
    const headers = removeHeader({ Vary: ['a', 'b'], Etag: ['"1"'] }, 'VARY');
    expect(headers).toEqual({ Etag: ['"1"'] });
  });

  it('remove of an absent header returns the same map', () => {
    const headers = { Etag: ['"1"'] };
    expect(removeHeader(headers, 'Vary')).toBe(headers);
  });

  it('does not mutate its input', () => {
    const headers = { Vary: ['a'] };
    appendHeader(headers, 'Vary', 'b');
    expect(headers).toEqual({ Vary: ['a'] });
  });

  it('hasHeader ignores case', () => {
    expect(hasHeader({ 'Content-Type': ['text/plain'] }, 'content-type')).toBe(true);
    expect(hasHeader({}, 'content-type')).toBe(false);
  });

  it('rejects invalid names', () => {
    let caught: unknown;
    try {
      setHeader({}, 'bad header', 'x');
    } catch (err) {
      caught = err;
    }
    expect(isCoreError(caught) && caught.code).toBe('INVALID_HEADER_VALUE');
  });

  it('rejects values with line breaks', () => {
    expect(() => assertHeaderValue('X-Test', 'a\r\nInjected: 1')).toThrow(
      'invalid value for header "X-Test"',
    );
  });
});
