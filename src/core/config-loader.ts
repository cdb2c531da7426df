/**
 * TOML-based configuration loader.
 *
 * Reads `config.toml` from the home directory, parses it with smol-toml,
 * validates it with `parseConfig()` and resolves the directories the
 * runtime needs relative to the home directory.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { parseConfig, defaultConfig } from '../types/config.js';
import type { PlinthConfig } from '../types/config.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from a home directory.
 *
 * If `config.toml` does not exist or is empty, returns the defaults.
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(home: string): PlinthConfig {
  const configPath = join(home, 'config.toml');

  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return defaultConfig();
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// Directory layout
// ---------------------------------------------------------------------------

/** Absolute locations derived from a config and its home directory. */
export interface RuntimePaths {
  home: string;
  configFile: string;
  contentDir: string;
  pluginsDir: string;
  themesDir: string;
  /** Null when file logging is disabled. */
  logFile: string | null;
}

function underHome(home: string, path: string): string {
  return isAbsolute(path) ? path : join(home, path);
}

export function resolvePaths(home: string, config: PlinthConfig): RuntimePaths {
  return {
    home,
    configFile: join(home, 'config.toml'),
    contentDir: underHome(home, config.server.content_dir),
    pluginsDir: underHome(home, config.plugins.dir),
    themesDir: underHome(home, config.themes.dir),
    logFile: config.logging.file.length > 0 ? underHome(home, config.logging.file) : null,
  };
}
