/**
 * Runtime JSON Schemas for `plugin.toml` and `theme.toml`, checked with
 * ajv after TOML parsing.
 *
 * Kept as plain objects so they can be fed directly to `ajv.compile()`.
 */

import { SCRIPT_ID_PATTERN } from './manifest.js';

const scriptFields = {
  id: { type: 'string', pattern: SCRIPT_ID_PATTERN },
  name: { type: 'string', minLength: 1 },
  main: { type: 'string', minLength: 1 },
} as const;

export const PLUGIN_MANIFEST_SCHEMA = {
  $id: 'plinth:plugin-manifest',
  type: 'object',
  additionalProperties: false,
  properties: scriptFields,
} as const;

export const THEME_MANIFEST_SCHEMA = {
  $id: 'plinth:theme-manifest',
  type: 'object',
  additionalProperties: false,
  properties: {
    ...scriptFields,
    templates_dir: { type: 'string', minLength: 1 },
  },
} as const;
