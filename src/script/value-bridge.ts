/**
 * Value bridge between host JSON and script-engine values.
 *
 * Host → engine goes through the engine's own `JSON.parse`, so every
 * object a script sees belongs to its realm and carries no host
 * prototypes. Engine → host walks the value with JSON semantics:
 * non-finite numbers become null, `undefined`, functions and symbols are
 * omitted from objects and become null inside arrays, `toJSON` is
 * honored. BigInt, promises and cycles cannot be represented and raise
 * a CONVERSION error.
 */

import type { JsonObject, JsonValue } from '../types/json.js';
import { setOwn } from '../types/json.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage, isCoreError } from '../core/core-error.js';

export type JsonParse = (text: string) => unknown;

// ---------------------------------------------------------------------------
// Host → engine
// ---------------------------------------------------------------------------

/** Materialize `value` with the engine realm's `JSON.parse`. */
export function toScriptValue(value: JsonValue, parse: JsonParse): unknown {
  return parse(JSON.stringify(value));
}

// ---------------------------------------------------------------------------
// Engine → host
// ---------------------------------------------------------------------------

/**
 * Convert an engine value (or any untrusted value) into host JSON.
 *
 * @throws CoreError CONVERSION with the path of the offending value.
 */
export function fromScriptValue(value: unknown): JsonValue {
  try {
    return convert(value, '$', '', new Set()) ?? null;
  } catch (err) {
    if (isCoreError(err)) throw err;
    throw new CoreError(ErrorCode.CONVERSION, `value could not be read: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function conversionError(path: string, reason: string): CoreError {
  return new CoreError(ErrorCode.CONVERSION, `${path}: ${reason}`, { detail: { path } });
}

function isThenable(value: object): boolean {
  return 'then' in value && typeof value.then === 'function';
}

function convert(
  value: unknown,
  path: string,
  key: string,
  ancestors: Set<object>,
): JsonValue | undefined {
  if (value === null) return null;
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return undefined;
  }
  if (typeof value === 'bigint') {
    throw conversionError(path, 'BigInt values have no JSON representation');
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value !== 'object') {
    throw conversionError(path, `unsupported value of type ${typeof value}`);
  }

  if (ancestors.has(value)) {
    throw conversionError(path, 'cyclic reference');
  }
  if (isThenable(value)) {
    throw conversionError(path, 'promises cannot cross into the host');
  }
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const replaced: unknown = value.toJSON(key);
    if (replaced !== value) {
      return convert(replaced, path, key, ancestors);
    }
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return items.map((item, index) => {
        return convert(item, `${path}[${index}]`, String(index), ancestors) ?? null;
      });
    }

    const result: JsonObject = {};
    const entries: [string, unknown][] = Object.entries(value);
    for (const [name, item] of entries) {
      const converted = convert(item, `${path}.${name}`, name, ancestors);
      if (converted !== undefined) {
        setOwn(result, name, converted);
      }
    }
    return result;
  } finally {
    ancestors.delete(value);
  }
}
