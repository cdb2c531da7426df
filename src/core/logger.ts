/**
 * Structured JSON logging.
 *
 * Component-scoped loggers with level filtering and an injectable sink.
 * Every entry is one JSON object carrying level, ts, component and msg;
 * request, plugin and theme identifiers are promoted to the top level so
 * a single request can be followed across the middleware, the actors
 * and the render pipeline.
 *
 * @example
 * ```ts
 * const logger = createLogger('middleware').withContext({ request: ctx.requestId });
 * logger.warn('hook failed', { plugin: 'seo', error_code: 'CALL_ERROR' });
 * // → {"level":"warn","ts":"...","component":"middleware","msg":"hook failed",
 * //    "request":"…","plugin":"seo","error_code":"CALL_ERROR"}
 * ```
 */

import { mkdirSync, appendFileSync } from 'node:fs';
import { dirname } from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  request?: string;
  plugin?: string;
  theme?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  request?: string;
  plugin?: string;
  theme?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stdout JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

// ---------------------------------------------------------------------------
// Default sink (stdout JSON)
// ---------------------------------------------------------------------------

function defaultSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'authorization',
  'Authorization',
  'cookie',
  'Cookie',
  'set-cookie',
  'Set-Cookie',
  'password',
  'secret',
  'token',
  'credential',
  'apiKey',
  'api_key',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

const PROMOTED_KEYS: ReadonlySet<string> = new Set([
  'duration_ms',
  'ok',
  'error_code',
  'request',
  'plugin',
  'theme',
]);

function promote(entry: LogEntry, meta: Record<string, unknown>): void {
  const { duration_ms, ok, error_code, request, plugin, theme } = meta;
  if (typeof duration_ms === 'number') entry.duration_ms = duration_ms;
  if (typeof ok === 'boolean') entry.ok = ok;
  if (typeof error_code === 'string') entry.error_code = error_code;
  if (typeof request === 'string') entry.request = request;
  if (typeof plugin === 'string') entry.plugin = plugin;
  if (typeof theme === 'string') entry.theme = theme;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'middleware'`, `'actor:theme'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.request) entry.request = boundContext.request;
      if (boundContext.plugin) entry.plugin = boundContext.plugin;
      if (boundContext.theme) entry.theme = boundContext.theme;
    }

    if (meta) {
      promote(entry, meta);
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      const remaining: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(sanitized)) {
        if (!PROMOTED_KEYS.has(key)) {
          remaining[key] = value;
        }
      }
      if (Object.keys(remaining).length > 0) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}

// ---------------------------------------------------------------------------
// Fan-out and file sinks
// ---------------------------------------------------------------------------

/** A sink that forwards every entry to each of `sinks` in order. */
export function createTeeSink(...sinks: LogSink[]): LogSink {
  return (entry) => {
    for (const sink of sinks) sink(entry);
  };
}

/** A LogSink that appends JSONL to a file, with a close() method. */
export interface FileLogSink extends LogSink {
  (entry: LogEntry): void;
  close(): void;
}

/**
 * Create a LogSink that appends JSONL to `filePath`, creating its parent
 * directory first. Entries written after `close()` are dropped.
 */
export function createFileLogSink(
  filePath: string,
  fs?: {
    mkdirSync: (path: string, options: { recursive: boolean }) => void;
    appendFileSync: (path: string, data: string) => void;
  },
): FileLogSink {
  const fsMkdir = fs?.mkdirSync ?? mkdirSync;
  const fsAppend = fs?.appendFileSync ?? appendFileSync;

  fsMkdir(dirname(filePath), { recursive: true });

  let closed = false;

  const write = (entry: LogEntry): void => {
    if (closed) return;
    fsAppend(filePath, JSON.stringify(entry) + '\n');
  };

  return Object.assign(write, {
    close: () => {
      closed = true;
    },
  });
}
