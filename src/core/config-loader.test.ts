import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, resolvePaths } from './config-loader.js';
import { DEFAULT_CONFIG, defaultConfig } from '../types/config.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function createTempRoot(): string {
  const root = join(
    tmpdir(),
    `plinth-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
  );
  mkdirSync(root, { recursive: true });
  return root;
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  let testRoot: string;

  beforeEach(() => {
    testRoot = createTempRoot();
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
  });

  it('returns the defaults when config.toml does not exist', () => {
    expect(loadConfig(testRoot)).toEqual(DEFAULT_CONFIG);
  });

  it('returns the defaults for an empty file', () => {
    writeFileSync(join(testRoot, 'config.toml'), '  \n', 'utf-8');
    expect(loadConfig(testRoot)).toEqual(DEFAULT_CONFIG);
  });

  it('parses sections, arrays of tables and comments', () => {
    const toml = `
# site settings
[plugins]
order = ["seo"]   # only seo runs
timeout_ms = 50

[[themes.mounts]]
mount_path = "/"
theme_id = "main"

[[themes.mounts]]
mount_path = "/docs"
theme_id = "manual"

[plugin_config.seo]
site = "Example"
`;
    writeFileSync(join(testRoot, 'config.toml'), toml, 'utf-8');
    const config = loadConfig(testRoot);

    expect(config.plugins.order).toEqual(['seo']);
    expect(config.plugins.timeout_ms).toBe(50);
    expect(config.themes.mounts).toEqual([
      { mount_path: '/', theme_id: 'main' },
      { mount_path: '/docs', theme_id: 'manual' },
    ]);
    expect(config.plugin_config['seo']).toEqual({ site: 'Example' });
    expect(config.breaker.max_failures).toBe(5);
  });

  it('throws on invalid TOML syntax', () => {
    writeFileSync(join(testRoot, 'config.toml'), 'this is not valid toml [[[', 'utf-8');
    expect(() => loadConfig(testRoot)).toThrow();
  });

  it('throws on invalid values', () => {
    writeFileSync(join(testRoot, 'config.toml'), '[breaker]\nmax_failures = -1\n', 'utf-8');
    expect(() => loadConfig(testRoot)).toThrow('breaker.max_failures must be a positive integer');
  });
});

// ---------------------------------------------------------------------------
// resolvePaths()
// ---------------------------------------------------------------------------

describe('resolvePaths', () => {
  it('places relative directories under the home directory', () => {
    const paths = resolvePaths('/srv/site', defaultConfig());

    expect(paths).toEqual({
      home: '/srv/site',
      configFile: '/srv/site/config.toml',
      contentDir: '/srv/site/content',
      pluginsDir: '/srv/site/plugins',
      themesDir: '/srv/site/themes',
      logFile: null,
    });
  });

  it('keeps absolute directories and resolves the log file', () => {
    const config = defaultConfig();
    config.server.content_dir = '/data/content';
    config.logging.file = 'logs/plinth.jsonl';

    const paths = resolvePaths('/srv/site', config);
    expect(paths.contentDir).toBe('/data/content');
    expect(paths.logFile).toBe('/srv/site/logs/plinth.jsonl');
  });
});
