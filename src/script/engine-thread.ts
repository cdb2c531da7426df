/**
 * Thread-backed engine client.
 *
 * Each client spawns one worker thread that owns one engine for its
 * whole life. Requests carry ids and the worker answers them in order.
 * Callers that stop waiting (a missed deadline) simply ignore the
 * promise; the reply still settles it when the script returns.
 */

import { Worker } from 'node:worker_threads';
import { dirname, join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import type { JsonValue } from '../types/json.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from '../core/core-error.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { isEngineMessage } from './engine-client.js';
import type {
  EngineClient,
  EngineMessage,
  EngineRequest,
  EngineWorkerData,
} from './engine-client.js';

// ---------------------------------------------------------------------------
// Worker entry resolution
// ---------------------------------------------------------------------------

const HERE = fileURLToPath(import.meta.url);
const FROM_SOURCE = HERE.endsWith('.ts');

/**
 * Spawn the engine worker. Running from TypeScript sources, the worker
 * loads its entry through tsx; from the build it loads the emitted file.
 */
function spawnEngineWorker(data: EngineWorkerData): Worker {
  const file = FROM_SOURCE ? 'engine-thread.worker.ts' : 'engine-thread.worker.js';
  const entry = join(dirname(HERE), file);
  const bootstrap = `import(${JSON.stringify(pathToFileURL(entry).href)});`;
  return new Worker(bootstrap, {
    eval: true,
    workerData: data,
    execArgv: FROM_SOURCE ? ['--import', 'tsx'] : [],
  });
}

// ---------------------------------------------------------------------------
// ThreadEngineClient
// ---------------------------------------------------------------------------

export interface ThreadEngineClientOptions {
  name: string;
  maxRunMs?: number;
  logger?: Logger;
}

interface PendingRequest {
  resolve: (value: JsonValue) => void;
  reject: (err: CoreError) => void;
}

type WithoutId<T> = T extends unknown ? Omit<T, 'id'> : never;
type OutgoingRequest = WithoutId<EngineRequest>;

export class ThreadEngineClient implements EngineClient {
  readonly name: string;
  private readonly worker: Worker;
  private readonly logger: Logger;
  private readonly pending = new Map<number, PendingRequest>();
  private nextId = 1;
  private failure: CoreError | null = null;
  private closed = false;

  constructor(options: ThreadEngineClientOptions) {
    this.name = options.name;
    this.logger = options.logger ?? createLogger(`engine:${options.name}`);
    this.worker = spawnEngineWorker({ name: options.name, maxRunMs: options.maxRunMs ?? 0 });

    this.worker.on('message', (message: unknown) => this.onMessage(message));
    this.worker.on('error', (err) => {
      const message = `engine thread crashed: ${err.message}`;
      this.fail(new CoreError(ErrorCode.EVAL_ERROR, message, { cause: err }));
    });
    this.worker.on('exit', (code) => {
      this.fail(new CoreError(ErrorCode.EVAL_ERROR, `engine thread exited with code ${code}`));
    });
  }

  async evaluate(source: string, filename?: string): Promise<JsonValue> {
    return this.send({ op: 'evaluate', source, ...(filename !== undefined ? { filename } : {}) });
  }

  async loadModule(name: string, source: string): Promise<void> {
    await this.send({ op: 'loadModule', name, source });
  }

  async call(path: string, args: readonly JsonValue[] = []): Promise<JsonValue> {
    return this.send({ op: 'call', path, args: [...args] });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.fail(new CoreError(ErrorCode.EVAL_ERROR, `engine thread ${this.name} is closed`));
    await this.worker.terminate();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private send(request: OutgoingRequest): Promise<JsonValue> {
    if (this.failure !== null) {
      return Promise.reject(this.failure);
    }
    const id = this.nextId++;
    return new Promise<JsonValue>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      try {
        this.worker.postMessage({ ...request, id });
      } catch (err) {
        this.pending.delete(id);
        reject(new CoreError(ErrorCode.CONVERSION, errorMessage(err), { cause: err }));
      }
    });
  }

  private onMessage(message: unknown): void {
    if (!isEngineMessage(message)) {
      this.logger.warn('unrecognized message from engine thread');
      return;
    }
    this.dispatch(message);
  }

  private dispatch(message: EngineMessage): void {
    if (message.type === 'console') {
      this.logger[message.level](message.message, { source: 'console' });
      return;
    }
    const waiter = this.pending.get(message.id);
    if (waiter === undefined) return;
    this.pending.delete(message.id);
    if (message.ok) {
      waiter.resolve(message.value);
    } else {
      waiter.reject(CoreError.fromPayload(message.error));
    }
  }

  private fail(err: CoreError): void {
    if (this.failure === null) {
      this.failure = err;
      if (!this.closed) {
        this.logger.error('engine thread stopped', { error_code: err.code, error: err.message });
      }
    }
    for (const waiter of this.pending.values()) {
      waiter.reject(err);
    }
    this.pending.clear();
  }
}
