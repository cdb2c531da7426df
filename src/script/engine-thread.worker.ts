/**
 * Worker-thread entry that owns exactly one {@link ScriptEngine}.
 *
 * Requests are handled one at a time in arrival order. Engine console
 * output is forwarded to the parent, which logs it with its own sink.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { ScriptEngine } from './engine.js';
import { isEngineRequest, isEngineWorkerData } from './engine-client.js';
import type { EngineMessage, EngineRequest } from './engine-client.js';
import type { JsonValue } from '../types/json.js';
import { ErrorCode } from '../types/errors.js';
import { toCoreError } from '../core/core-error.js';

const port = parentPort;
if (port === null) {
  throw new Error('engine-thread.worker must run inside a worker thread');
}
const data: unknown = workerData;
if (!isEngineWorkerData(data)) {
  throw new Error('engine-thread.worker started without engine worker data');
}

const post = (message: EngineMessage): void => port.postMessage(message);

const engine = new ScriptEngine({
  name: data.name,
  maxRunMs: data.maxRunMs,
  onConsole: (level, message) => post({ type: 'console', level, message }),
});

function handle(request: EngineRequest): JsonValue {
  switch (request.op) {
    case 'evaluate':
      return engine.evaluate(request.source, request.filename);
    case 'loadModule':
      engine.loadModule(request.name, request.source);
      return null;
    case 'call':
      return engine.call(request.path, request.args);
  }
}

port.on('message', (request: unknown) => {
  if (!isEngineRequest(request)) return;
  try {
    post({ type: 'reply', id: request.id, ok: true, value: handle(request) });
  } catch (err) {
    const error = toCoreError(err, ErrorCode.EVAL_ERROR).toErrorPayload();
    post({ type: 'reply', id: request.id, ok: false, error });
  }
});
