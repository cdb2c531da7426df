/**
 * Scripting engine: one isolated `node:vm` context per instance.
 *
 * The contract is synchronous and single-threaded. An instance must
 * stay on the thread that created it; {@link ThreadEngineClient} pins
 * one to a worker thread and {@link InlineEngineClient} keeps one on the
 * caller's thread.
 *
 * Nothing from the host realm is placed inside the context. Arguments
 * are materialized with the context's own `JSON.parse`, and the
 * `console` scripts see is defined inside the context and buffered;
 * the host drains it after every operation.
 */

import vm from 'node:vm';
import type { JsonValue } from '../types/json.js';
import { ErrorCode } from '../types/errors.js';
import type { ErrorCodeValue } from '../types/errors.js';
import { CoreError, errorMessage, isCoreError } from '../core/core-error.js';
import { createLogger, isLogLevel } from '../core/logger.js';
import type { Logger, LogLevel } from '../core/logger.js';
import { fromScriptValue, toScriptValue } from './value-bridge.js';
import type { JsonParse } from './value-bridge.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export type ConsoleHandler = (level: LogLevel, message: string) => void;

export interface ScriptEngineOptions {
  /** Engine name, used in logs and script filenames. */
  name?: string;
  /**
   * Hard limit on a single synchronous run, in ms. 0 disables it, which
   * leaves a runaway script blocking its engine forever.
   */
  maxRunMs?: number;
  /** Receives drained `console.*` output. Defaults to the engine logger. */
  onConsole?: ConsoleHandler;
  logger?: Logger;
}

/** Cap on buffered console lines between two drains. */
export const CONSOLE_BUFFER_LIMIT = 1000;

const PRELUDE = `
(() => {
  const buffer = [];
  const format = (args) => args.map((arg) => {
    if (typeof arg === 'string') return arg;
    try { return JSON.stringify(arg); } catch (err) { return String(arg); }
  }).join(' ');
  const writer = (level) => (...args) => {
    if (buffer.length < ${CONSOLE_BUFFER_LIMIT}) buffer.push([level, format(args)]);
  };
  const console = Object.freeze({
    log: writer('info'),
    info: writer('info'),
    debug: writer('debug'),
    warn: writer('warn'),
    error: writer('error'),
  });
  Object.defineProperty(globalThis, 'console', { value: console });
  Object.defineProperty(globalThis, '__drainConsole', {
    value: () => buffer.splice(0, buffer.length),
  });
})();
`;

const INVOKE_SOURCE =
  'globalThis.__invoke.fn.apply(globalThis.__invoke.self, globalThis.__invoke.args)';

// ---------------------------------------------------------------------------
// ScriptEngine
// ---------------------------------------------------------------------------

export class ScriptEngine {
  readonly name: string;
  private readonly context: vm.Context;
  private readonly runOptions: vm.RunningCodeOptions;
  private readonly parseJson: JsonParse;
  private readonly invokeScript: vm.Script;
  private readonly drainScript: vm.Script;
  private readonly onConsole: ConsoleHandler;
  private readonly logger: Logger;

  constructor(options: ScriptEngineOptions = {}) {
    this.name = options.name ?? 'engine';
    this.logger = options.logger ?? createLogger(`engine:${this.name}`);
    this.onConsole =
      options.onConsole ?? ((level, message) => this.logger[level](message, { source: 'console' }));

    const maxRunMs = options.maxRunMs ?? 0;
    this.runOptions = maxRunMs > 0 ? { timeout: maxRunMs } : {};

    this.context = vm.createContext(
      {},
      { name: this.name, codeGeneration: { strings: false, wasm: false } },
    );
    vm.runInContext(PRELUDE, this.context, { filename: `${this.name}:prelude` });

    const parse: unknown = vm.runInContext('JSON.parse', this.context);
    if (typeof parse !== 'function') {
      throw new CoreError(ErrorCode.EVAL_ERROR, 'engine context has no JSON.parse');
    }
    this.parseJson = (text) => {
      const parsed: unknown = parse(text);
      return parsed;
    };
    this.invokeScript = new vm.Script(INVOKE_SOURCE, { filename: `${this.name}:invoke` });
    this.drainScript = new vm.Script('globalThis.__drainConsole()', {
      filename: `${this.name}:console`,
    });
  }

  /**
   * Evaluate `source` in the engine's global scope and return its
   * completion value as JSON.
   *
   * @throws CoreError EVAL_ERROR or CONVERSION
   */
  evaluate(source: string, filename = `${this.name}:eval`): JsonValue {
    try {
      const result: unknown = this.run(source, filename);
      return fromScriptValue(result);
    } catch (err) {
      throw this.wrap(err, ErrorCode.EVAL_ERROR, filename);
    } finally {
      this.drainConsole();
    }
  }

  /**
   * Evaluate a module for its side effects. Modules attach an object to
   * the global scope under a host-chosen identifier.
   *
   * @throws CoreError EVAL_ERROR
   */
  loadModule(name: string, source: string): void {
    try {
      this.run(source, `${name}.js`);
    } catch (err) {
      throw this.wrap(err, ErrorCode.EVAL_ERROR, name);
    } finally {
      this.drainConsole();
    }
  }

  /**
   * Resolve `path` (e.g. `"seo.before"`) against the global object and
   * call it with `args`, bound to its parent object.
   *
   * @throws CoreError CALL_ERROR (including "is not a function") or CONVERSION
   */
  call(path: string, args: readonly JsonValue[] = []): JsonValue {
    const { fn, self } = this.resolve(path);
    try {
      const holder: Record<string, unknown> = vm.runInContext('({})', this.context);
      holder.fn = fn;
      holder.self = self;
      holder.args = toScriptValue([...args], this.parseJson);
      this.context.__invoke = holder;
      const result: unknown = this.invokeScript.runInContext(this.context, this.runOptions);
      return fromScriptValue(result);
    } catch (err) {
      throw this.wrap(err, ErrorCode.CALL_ERROR, path);
    } finally {
      delete this.context.__invoke;
      this.drainConsole();
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private run(source: string, filename: string): unknown {
    const script = new vm.Script(source, { filename });
    return script.runInContext(this.context, this.runOptions);
  }

  private resolve(path: string): { fn: unknown; self: object } {
    const segments = path.split('.');
    if (segments.some((segment) => segment.length === 0)) {
      throw new CoreError(ErrorCode.CALL_ERROR, `invalid function path "${path}"`);
    }

    const global: object = vm.runInContext('globalThis', this.context);
    let self = global;
    let current: unknown = global;
    for (const [index, segment] of segments.entries()) {
      if (!isObjectLike(current)) {
        const parent = segments.slice(0, index).join('.');
        throw new CoreError(ErrorCode.CALL_ERROR, `${parent} is not an object`);
      }
      self = current;
      current = Reflect.get(current, segment);
    }

    if (typeof current !== 'function') {
      throw new CoreError(ErrorCode.CALL_ERROR, `${path} is not a function`);
    }
    return { fn: current, self };
  }

  private drainConsole(): void {
    let drained: JsonValue;
    try {
      drained = fromScriptValue(this.drainScript.runInContext(this.context));
    } catch (err) {
      this.logger.warn('console buffer could not be drained', { error: errorMessage(err) });
      return;
    }
    if (!Array.isArray(drained)) return;
    for (const line of drained) {
      if (!Array.isArray(line)) continue;
      const [level, message] = line;
      if (isLogLevel(level) && typeof message === 'string') {
        this.onConsole(level, message);
      }
    }
  }

  private wrap(err: unknown, code: ErrorCodeValue, where: string): CoreError {
    if (isCoreError(err)) return err;
    return new CoreError(code, errorMessage(err), { cause: err, detail: { where } });
  }
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}
