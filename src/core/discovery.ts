/**
 * Plugin and theme discovery.
 *
 * Each immediate subdirectory of a root that holds a manifest
 * (`plugin.toml` or `theme.toml`) is one script. The manifest is parsed
 * with smol-toml, validated with ajv and its defaults filled in; the
 * script source is read eagerly. Directories without a manifest are
 * skipped. A missing root yields nothing.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseTOML } from 'smol-toml';
import _Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;
import type { PluginManifest, ThemeManifest } from '../types/manifest.js';
import {
  DEFAULT_PLUGIN_MAIN,
  DEFAULT_TEMPLATES_DIR,
  DEFAULT_THEME_MAIN,
  isValidScriptId,
} from '../types/manifest.js';
import { PLUGIN_MANIFEST_SCHEMA, THEME_MANIFEST_SCHEMA } from '../types/manifest-schema.js';
import { ErrorCode } from '../types/errors.js';
import type { ErrorCodeValue } from '../types/errors.js';
import type { ScriptSource } from '../runtime/plugin-actor.js';
import { CoreError, errorMessage } from './core-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DiscoveredPlugin {
  dir: string;
  script: ScriptSource;
}

export interface DiscoveredTheme {
  dir: string;
  script: ScriptSource;
  /** Absolute templates directory; it may not exist. */
  templatesDir: string;
}

const ajv = new Ajv({ allErrors: true });
const validatePluginManifest = ajv.compile<PluginManifest>(PLUGIN_MANIFEST_SCHEMA);
const validateThemeManifest = ajv.compile<ThemeManifest>(THEME_MANIFEST_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors) return '';
  return errors.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/**
 * @throws CoreError PLUGIN_BOOTSTRAP for an unreadable or invalid manifest,
 *   a missing script, or a duplicate id
 */
export async function discoverPlugins(root: string): Promise<DiscoveredPlugin[]> {
  const found: DiscoveredPlugin[] = [];
  for (const entry of await scriptDirectories(root, 'plugin.toml', ErrorCode.PLUGIN_BOOTSTRAP)) {
    const fail = failure(ErrorCode.PLUGIN_BOOTSTRAP, `plugin in ${entry.dir}`);
    const raw = parseManifest(entry.manifest, fail);
    if (!validatePluginManifest(raw)) {
      throw fail(`invalid plugin.toml: ${describeErrors(validatePluginManifest.errors)}`);
    }
    const script = await readScript(entry, raw, DEFAULT_PLUGIN_MAIN, fail);
    found.push({ dir: entry.dir, script });
  }
  assertUniqueIds(found, ErrorCode.PLUGIN_BOOTSTRAP, 'plugin');
  return found;
}

/**
 * @throws CoreError THEME_BOOTSTRAP for an unreadable or invalid manifest,
 *   a missing script, or a duplicate id
 */
export async function discoverThemes(root: string): Promise<DiscoveredTheme[]> {
  const found: DiscoveredTheme[] = [];
  for (const entry of await scriptDirectories(root, 'theme.toml', ErrorCode.THEME_BOOTSTRAP)) {
    const fail = failure(ErrorCode.THEME_BOOTSTRAP, `theme in ${entry.dir}`);
    const raw = parseManifest(entry.manifest, fail);
    if (!validateThemeManifest(raw)) {
      throw fail(`invalid theme.toml: ${describeErrors(validateThemeManifest.errors)}`);
    }
    const script = await readScript(entry, raw, DEFAULT_THEME_MAIN, fail);
    found.push({
      dir: entry.dir,
      script,
      templatesDir: join(entry.dir, raw.templates_dir ?? DEFAULT_TEMPLATES_DIR),
    });
  }
  assertUniqueIds(found, ErrorCode.THEME_BOOTSTRAP, 'theme');
  return found;
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

interface ScriptDirectory {
  name: string;
  dir: string;
  manifest: string;
}

type Fail = (reason: string, cause?: unknown) => CoreError;

function failure(code: ErrorCodeValue, what: string): Fail {
  return (reason, cause) =>
    new CoreError(code, `${what}: ${reason}`, cause === undefined ? {} : { cause });
}

/** Subdirectories of `root` holding `manifestName`, sorted by name. */
async function scriptDirectories(
  root: string,
  manifestName: string,
  code: ErrorCodeValue,
): Promise<ScriptDirectory[]> {
  let names: string[];
  try {
    const entries = await readdir(root, { withFileTypes: true });
    names = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw new CoreError(code, `cannot read ${root}: ${errorMessage(err)}`, { cause: err });
  }

  const result: ScriptDirectory[] = [];
  for (const name of names.sort()) {
    const dir = join(root, name);
    let manifest: string;
    try {
      manifest = await readFile(join(dir, manifestName), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) continue;
      throw new CoreError(code, `cannot read ${join(dir, manifestName)}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    result.push({ name, dir, manifest });
  }
  return result;
}

function parseManifest(source: string, fail: Fail): unknown {
  try {
    return parseTOML(source);
  } catch (err) {
    throw fail(`manifest is not valid TOML: ${errorMessage(err)}`, err);
  }
}

async function readScript(
  entry: ScriptDirectory,
  manifest: PluginManifest,
  defaultMain: string,
  fail: Fail,
): Promise<ScriptSource> {
  const id = manifest.id ?? entry.name;
  if (!isValidScriptId(id)) {
    throw fail(`"${id}" is not a valid id; set one in the manifest`);
  }
  const main = manifest.main ?? defaultMain;
  let source: string;
  try {
    source = await readFile(join(entry.dir, main), 'utf-8');
  } catch (err) {
    throw fail(`cannot read ${main}: ${errorMessage(err)}`, err);
  }
  return { id, name: manifest.name ?? id, source };
}

function assertUniqueIds(
  found: ReadonlyArray<{ dir: string; script: ScriptSource }>,
  code: ErrorCodeValue,
  kind: string,
): void {
  const seen = new Map<string, string>();
  for (const { dir, script } of found) {
    const first = seen.get(script.id);
    if (first !== undefined) {
      throw new CoreError(code, `${kind} id "${script.id}" is used by both ${first} and ${dir}`);
    }
    seen.set(script.id, dir);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
