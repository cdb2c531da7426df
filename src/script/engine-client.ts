/**
 * Asynchronous handle on a {@link ScriptEngine}.
 *
 * Actors only talk to engines through this interface. The thread-backed
 * client pins its engine to one worker thread; the inline client runs
 * it on the caller's thread, which is what unit tests and the
 * `scripting.isolation = "inline"` setting use.
 */

import type { JsonValue } from '../types/json.js';
import type { ErrorPayload } from '../types/errors.js';
import { isErrorCode } from '../types/errors.js';
import { isLogLevel } from '../core/logger.js';
import type { LogLevel } from '../core/logger.js';
import { ScriptEngine } from './engine.js';
import type { ScriptEngineOptions } from './engine.js';

// ---------------------------------------------------------------------------
// EngineClient
// ---------------------------------------------------------------------------

export interface EngineClient {
  readonly name: string;
  evaluate(source: string, filename?: string): Promise<JsonValue>;
  loadModule(name: string, source: string): Promise<void>;
  call(path: string, args?: readonly JsonValue[]): Promise<JsonValue>;
  close(): Promise<void>;
}

/** Creates one engine client per plugin set or theme. */
export type EngineFactory = (name: string) => EngineClient;

// ---------------------------------------------------------------------------
// InlineEngineClient
// ---------------------------------------------------------------------------

export class InlineEngineClient implements EngineClient {
  readonly name: string;
  private readonly engine: ScriptEngine;

  constructor(options: ScriptEngineOptions = {}) {
    this.engine = new ScriptEngine(options);
    this.name = this.engine.name;
  }

  async evaluate(source: string, filename?: string): Promise<JsonValue> {
    return this.engine.evaluate(source, filename);
  }

  async loadModule(name: string, source: string): Promise<void> {
    this.engine.loadModule(name, source);
  }

  async call(path: string, args: readonly JsonValue[] = []): Promise<JsonValue> {
    return this.engine.call(path, args);
  }

  async close(): Promise<void> {}
}

// ---------------------------------------------------------------------------
// Worker protocol
// ---------------------------------------------------------------------------

export type EngineRequest =
  | { id: number; op: 'evaluate'; source: string; filename?: string }
  | { id: number; op: 'loadModule'; name: string; source: string }
  | { id: number; op: 'call'; path: string; args: JsonValue[] };

export type EngineMessage =
  | { type: 'reply'; id: number; ok: true; value: JsonValue }
  | { type: 'reply'; id: number; ok: false; error: ErrorPayload }
  | { type: 'console'; level: LogLevel; message: string };

/** Data handed to the worker at spawn time. */
export interface EngineWorkerData {
  name: string;
  maxRunMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isEngineRequest(value: unknown): value is EngineRequest {
  if (!isRecord(value) || typeof value['id'] !== 'number') return false;
  switch (value['op']) {
    case 'evaluate':
      return (
        typeof value['source'] === 'string' &&
        (value['filename'] === undefined || typeof value['filename'] === 'string')
      );
    case 'loadModule':
      return typeof value['name'] === 'string' && typeof value['source'] === 'string';
    case 'call':
      return typeof value['path'] === 'string' && Array.isArray(value['args']);
    default:
      return false;
  }
}

export function isEngineMessage(value: unknown): value is EngineMessage {
  if (!isRecord(value)) return false;
  if (value['type'] === 'console') {
    return isLogLevel(value['level']) && typeof value['message'] === 'string';
  }
  if (value['type'] !== 'reply' || typeof value['id'] !== 'number') return false;
  if (value['ok'] === true) return 'value' in value;
  const error = value['error'];
  return (
    value['ok'] === false &&
    isRecord(error) &&
    isErrorCode(error['code']) &&
    typeof error['message'] === 'string'
  );
}

export function isEngineWorkerData(value: unknown): value is EngineWorkerData {
  return (
    isRecord(value) && typeof value['name'] === 'string' && typeof value['maxRunMs'] === 'number'
  );
}
