/**
 * Plugin and theme manifests.
 *
 * A plugin directory holds `plugin.toml`, a theme directory `theme.toml`.
 * Every field is optional: the id defaults to the directory name, the
 * name to the id.
 */

/** `plugin.toml`. */
export interface PluginManifest {
  id?: string;
  name?: string;
  /** Script file, relative to the plugin directory. Defaults to `plugin.js`. */
  main?: string;
}

/** `theme.toml`. */
export interface ThemeManifest {
  id?: string;
  name?: string;
  /** Defaults to `theme.js`. */
  main?: string;
  /** Defaults to `templates`. */
  templates_dir?: string;
}

export const DEFAULT_PLUGIN_MAIN = 'plugin.js';
export const DEFAULT_THEME_MAIN = 'theme.js';
export const DEFAULT_TEMPLATES_DIR = 'templates';

/**
 * Ids name a global slot in the engine and the first segment of a call
 * path, so dots are not allowed.
 */
export const SCRIPT_ID_PATTERN = '^[A-Za-z0-9_-]+$';

export function isValidScriptId(id: string): boolean {
  return new RegExp(SCRIPT_ID_PATTERN).test(id);
}
