/**
 * RFC 6902 JSON Patch on JSON values, through fast-json-patch.
 *
 * A document is applied to a copy of its target, so a failing operation
 * leaves the original untouched.
 */

import jsonpatch from 'fast-json-patch';
import type { Operation } from 'fast-json-patch';
import type { JsonValue } from '../types/json.js';
import { isRecord } from '../types/json.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from '../core/core-error.js';

const VALUE_OPS: ReadonlySet<string> = new Set(['add', 'replace', 'test']);
const FROM_OPS: ReadonlySet<string> = new Set(['move', 'copy']);

export function isOperation(value: unknown): value is Operation {
  if (!isRecord(value)) return false;
  const { op, path } = value;
  if (typeof op !== 'string' || typeof path !== 'string') return false;
  if (VALUE_OPS.has(op)) return 'value' in value;
  if (FROM_OPS.has(op)) return typeof value['from'] === 'string';
  return op === 'remove';
}

/**
 * Check that every entry of `patch` is an RFC 6902 operation.
 *
 * @throws CoreError JSON_PATCH naming the first malformed entry
 */
export function toOperations(patch: readonly JsonValue[]): Operation[] {
  const operations: Operation[] = [];
  for (const [index, entry] of patch.entries()) {
    if (!isOperation(entry)) {
      throw new CoreError(ErrorCode.JSON_PATCH, `patch operation ${index} is malformed`);
    }
    operations.push(entry);
  }
  return operations;
}

/**
 * Apply one patch document to `document` and return the patched copy.
 *
 * @throws CoreError JSON_PATCH when an operation is malformed or fails
 */
export function applyJsonPatch(document: JsonValue, patch: readonly JsonValue[]): JsonValue {
  const operations = toOperations(patch);
  try {
    return jsonpatch.applyPatch(document, operations, true, false).newDocument;
  } catch (err) {
    throw new CoreError(ErrorCode.JSON_PATCH, errorMessage(err), { cause: err });
  }
}
