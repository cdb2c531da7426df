/**
 * Configuration schema and PLINTH_HOME resolution.
 *
 * Defines the TypeScript types for the sections of `config.toml`, the
 * defaults applied when a section or key is absent, and `parseConfig()`,
 * which validates a raw TOML table into a fully typed `PlinthConfig`.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import type { JsonObject } from './json.js';
import { isJsonObject, setOwn } from './json.js';
import type { LogLevel } from '../core/logger.js';
import { isLogLevel } from '../core/logger.js';
import { fromScriptValue } from '../script/value-bridge.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[server]` section. */
export interface ServerConfig {
  host: string;
  port: number;
  /** Content root, relative to the home directory unless absolute. */
  content_dir: string;
}

/** `[plugins]` section. */
export interface PluginsConfig {
  dir: string;
  /** Plugin ids in execution order; empty runs every discovered plugin by id. */
  order: string[];
  /** Per-hook deadline. */
  timeout_ms: number;
}

/** `[breaker]` section. */
export interface BreakerConfig {
  window_sec: number;
  max_failures: number;
  open_sec: number;
}

/** `[render]` section. */
export interface RenderConfig {
  regex_tail_window: number;
}

export interface ThemeMountConfig {
  mount_path: string;
  theme_id: string;
}

/** `[themes]` section. */
export interface ThemesConfig {
  dir: string;
  mounts: ThemeMountConfig[];
}

export type ScriptIsolation = 'thread' | 'inline';

/** `[scripting]` section. */
export interface ScriptingConfig {
  isolation: ScriptIsolation;
  /** Hard limit on one synchronous script run; 0 disables it. */
  max_run_ms: number;
}

/** `[logging]` section. */
export interface LoggingConfig {
  level: LogLevel;
  /** JSONL log file, relative to the home directory; empty for none. */
  file: string;
}

export interface PlinthConfig {
  server: ServerConfig;
  plugins: PluginsConfig;
  breaker: BreakerConfig;
  render: RenderConfig;
  themes: ThemesConfig;
  scripting: ScriptingConfig;
  logging: LoggingConfig;
  /** `[plugin_config.<id>]` tables. */
  plugin_config: Record<string, JsonObject>;
  /** `[theme_config.<id>]` tables. */
  theme_config: Record<string, JsonObject>;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: Readonly<PlinthConfig> = {
  server: { host: '127.0.0.1', port: 8080, content_dir: 'content' },
  plugins: { dir: 'plugins', order: [], timeout_ms: 100 },
  breaker: { window_sec: 30, max_failures: 5, open_sec: 30 },
  render: { regex_tail_window: 4096 },
  themes: { dir: 'themes', mounts: [{ mount_path: '/', theme_id: 'default' }] },
  scripting: { isolation: 'thread', max_run_ms: 5000 },
  logging: { level: 'info', file: '' },
  plugin_config: {},
  theme_config: {},
};

/** A fresh, deep copy of the defaults. */
export function defaultConfig(): PlinthConfig {
  return structuredClone(DEFAULT_CONFIG);
}

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the home directory.
 *
 * Precedence:
 *  1. `$PLINTH_HOME` (if non-empty)
 *  2. `~/.plinth/`
 *
 * A leading `~` is expanded and a trailing slash stripped.
 */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const envValue = env['PLINTH_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.plinth');
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function table(raw: Table, key: string): Table {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isTable(value)) {
    throw new Error(`${key} must be a table`);
  }
  return value;
}

function readString(section: Table, key: string, fallback: string, label: string): string {
  const value = section[key] ?? fallback;
  if (typeof value !== 'string') {
    throw new Error(`${label}.${key} must be a string`);
  }
  return value;
}

function readPositiveInt(section: Table, key: string, fallback: number, label: string): number {
  const value = section[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${label}.${key} must be a positive integer`);
  }
  return value;
}

function readNonNegativeInt(section: Table, key: string, fallback: number, label: string): number {
  const value = section[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${label}.${key} must be a non-negative integer`);
  }
  return value;
}

function readStringArray(section: Table, key: string, fallback: string[], label: string): string[] {
  const value = section[key] ?? fallback;
  if (!Array.isArray(value)) {
    throw new Error(`${label}.${key} must be an array`);
  }
  const result: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new Error(`${label}.${key} entries must be non-empty strings`);
    }
    result.push(entry);
  }
  return result;
}

function readMounts(section: Table): ThemeMountConfig[] {
  const value = section['mounts'] ?? DEFAULT_CONFIG.themes.mounts;
  if (!Array.isArray(value)) {
    throw new Error('themes.mounts must be an array');
  }
  return value.map((entry, index) => {
    if (!isTable(entry)) {
      throw new Error(`themes.mounts[${index}] must be a table`);
    }
    const mountPath = entry['mount_path'];
    const themeId = entry['theme_id'];
    if (typeof mountPath !== 'string' || !mountPath.startsWith('/')) {
      throw new Error(`themes.mounts[${index}].mount_path must be a string starting with "/"`);
    }
    if (typeof themeId !== 'string' || themeId.length === 0) {
      throw new Error(`themes.mounts[${index}].theme_id must be a non-empty string`);
    }
    return { mount_path: mountPath, theme_id: themeId };
  });
}

function readObjectMap(raw: Table, key: string): Record<string, JsonObject> {
  const section = table(raw, key);
  const result: Record<string, JsonObject> = {};
  for (const [id, value] of Object.entries(section)) {
    const json = fromScriptValue(value);
    if (!isJsonObject(json)) {
      throw new Error(`${key}.${id} must be a table`);
    }
    setOwn(result, id, json);
  }
  return result;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Validate a raw config table (e.g. from TOML parsing) into a fully typed
 * `PlinthConfig`, applying defaults for missing sections and keys.
 *
 * @throws Error naming the offending key.
 */
export function parseConfig(raw: Record<string, unknown>): PlinthConfig {
  const defaults = DEFAULT_CONFIG;

  // --- server ---
  const rawServer = table(raw, 'server');
  const port = readPositiveInt(rawServer, 'port', defaults.server.port, 'server');
  if (port > 65535) {
    throw new Error('server.port must be at most 65535');
  }
  const server: ServerConfig = {
    host: readString(rawServer, 'host', defaults.server.host, 'server'),
    port,
    content_dir: readString(rawServer, 'content_dir', defaults.server.content_dir, 'server'),
  };

  // --- plugins ---
  const rawPlugins = table(raw, 'plugins');
  const plugins: PluginsConfig = {
    dir: readString(rawPlugins, 'dir', defaults.plugins.dir, 'plugins'),
    order: readStringArray(rawPlugins, 'order', defaults.plugins.order, 'plugins'),
    timeout_ms: readPositiveInt(rawPlugins, 'timeout_ms', defaults.plugins.timeout_ms, 'plugins'),
  };
  if (new Set(plugins.order).size !== plugins.order.length) {
    throw new Error('plugins.order must not list a plugin twice');
  }

  // --- breaker ---
  const rawBreaker = table(raw, 'breaker');
  const breaker: BreakerConfig = {
    window_sec: readPositiveInt(rawBreaker, 'window_sec', defaults.breaker.window_sec, 'breaker'),
    max_failures: readPositiveInt(
      rawBreaker,
      'max_failures',
      defaults.breaker.max_failures,
      'breaker',
    ),
    open_sec: readPositiveInt(rawBreaker, 'open_sec', defaults.breaker.open_sec, 'breaker'),
  };

  // --- render ---
  const rawRender = table(raw, 'render');
  const render: RenderConfig = {
    regex_tail_window: readPositiveInt(
      rawRender,
      'regex_tail_window',
      defaults.render.regex_tail_window,
      'render',
    ),
  };

  // --- themes ---
  const rawThemes = table(raw, 'themes');
  const themes: ThemesConfig = {
    dir: readString(rawThemes, 'dir', defaults.themes.dir, 'themes'),
    mounts: readMounts(rawThemes),
  };

  // --- scripting ---
  const rawScripting = table(raw, 'scripting');
  const isolation = rawScripting['isolation'] ?? defaults.scripting.isolation;
  if (isolation !== 'thread' && isolation !== 'inline') {
    throw new Error(
      `Invalid scripting.isolation: "${String(isolation)}". ` + 'Must be one of: thread, inline',
    );
  }
  const scripting: ScriptingConfig = {
    isolation,
    max_run_ms: readNonNegativeInt(
      rawScripting,
      'max_run_ms',
      defaults.scripting.max_run_ms,
      'scripting',
    ),
  };

  // --- logging ---
  const rawLogging = table(raw, 'logging');
  const level = rawLogging['level'] ?? defaults.logging.level;
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${String(level)}". ` + 'Must be one of: debug, info, warn, error',
    );
  }
  const logging: LoggingConfig = {
    level,
    file: readString(rawLogging, 'file', defaults.logging.file, 'logging'),
  };

  return {
    server,
    plugins,
    breaker,
    render,
    themes,
    scripting,
    logging,
    plugin_config: readObjectMap(raw, 'plugin_config'),
    theme_config: readObjectMap(raw, 'theme_config'),
  };
}
