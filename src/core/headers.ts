/**
 * Header name canonicalization and response header operations.
 *
 * Names are kept in `First-Letter-Of-Each-Segment` form on both the
 * request context and the response spec. Validity follows node:http,
 * so anything accepted here can be written by the HTTP adapter.
 */

import { validateHeaderName, validateHeaderValue } from 'node:http';
import type { ResponseHeaders } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from './core-error.js';
import { setOwn } from '../types/json.js';

// ---------------------------------------------------------------------------
// Canonical names
// ---------------------------------------------------------------------------

/** `content-TYPE` → `Content-Type`. */
export function canonicalHeaderName(name: string): string {
  return name
    .toLowerCase()
    .split('-')
    .map((segment) => (segment.length > 0 ? segment[0].toUpperCase() + segment.slice(1) : segment))
    .join('-');
}

/**
 * Canonicalize an incoming header map. Multi-valued headers, and names
 * that collide after canonicalization, are joined with `", "`.
 */
export function normalizeRequestHeaders(
  raw: Readonly<Record<string, string | readonly string[] | undefined>>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    const joined = typeof value === 'string' ? value : value.join(', ');
    const key = canonicalHeaderName(name);
    const existing = Object.hasOwn(result, key) ? result[key] : undefined;
    setOwn(result, key, existing === undefined ? joined : `${existing}, ${joined}`);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Throw INVALID_HEADER_VALUE unless `name` is a valid HTTP token. */
export function assertHeaderName(name: string): void {
  try {
    validateHeaderName(name);
  } catch (err) {
    throw new CoreError(ErrorCode.INVALID_HEADER_VALUE, `invalid header name "${name}"`, {
      cause: err,
      detail: { reason: errorMessage(err) },
    });
  }
}

/** Throw INVALID_HEADER_VALUE unless `value` may be sent for `name`. */
export function assertHeaderValue(name: string, value: string): void {
  try {
    validateHeaderValue(name, value);
  } catch (err) {
    throw new CoreError(ErrorCode.INVALID_HEADER_VALUE, `invalid value for header "${name}"`, {
      cause: err,
      detail: { reason: errorMessage(err) },
    });
  }
}

// ---------------------------------------------------------------------------
// Response header operations
// ---------------------------------------------------------------------------

/** Replace every value of `name` with `value`. */
export function setHeader(headers: ResponseHeaders, name: string, value: string): ResponseHeaders {
  assertHeaderName(name);
  assertHeaderValue(name, value);
  return { ...headers, [canonicalHeaderName(name)]: [value] };
}

/** Add `value` alongside any existing values of `name`. */
export function appendHeader(
  headers: ResponseHeaders,
  name: string,
  value: string,
): ResponseHeaders {
  assertHeaderName(name);
  assertHeaderValue(name, value);
  const key = canonicalHeaderName(name);
  const existing = Object.hasOwn(headers, key) ? headers[key] : [];
  return { ...headers, [key]: [...existing, value] };
}

/** Delete every value of `name`. */
export function removeHeader(headers: ResponseHeaders, name: string): ResponseHeaders {
  assertHeaderName(name);
  const key = canonicalHeaderName(name);
  if (!Object.hasOwn(headers, key)) return headers;
  const { [key]: _removed, ...rest } = headers;
  return rest;
}

export function hasHeader(headers: ResponseHeaders, name: string): boolean {
  const key = canonicalHeaderName(name);
  return Object.hasOwn(headers, key) && headers[key].length > 0;
}
