import { describe, it, expect, vi } from 'vitest';
import { parseArgs, runCommand, serve, check } from './cli.js';
import type { CliDeps, ServerHandle } from './cli.js';
import { VERSION } from './index.js';
import type { Runtime } from './core/bootstrap.js';
import { CoreError } from './core/core-error.js';
import { RequestProcessor } from './core/request-processor.js';
import { fallbackResolver } from './core/content-resolver.js';
import { createContextBuilder } from './core/context-builder.js';
import { BodyRenderPipeline } from './render/pipeline.js';
import { defaultConfig } from './types/config.js';
import { ErrorCode } from './types/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const HOME = '/tmp/test-plinth-home';

function createRuntime(): Runtime {
  return {
    paths: {
      home: HOME,
      configFile: `${HOME}/config.toml`,
      contentDir: `${HOME}/content`,
      pluginsDir: `${HOME}/plugins`,
      themesDir: `${HOME}/themes`,
      logFile: null,
    },
    processor: new RequestProcessor({
      resolver: fallbackResolver,
      buildContext: createContextBuilder(),
      middleware: { runBefore: async (ctx) => ctx, runAfter: async (ctx) => ctx },
      dispatcher: {
        dispatch: async () => {
          throw new CoreError(ErrorCode.UNKNOWN_THEME, 'no themes');
        },
      },
      pipeline: new BodyRenderPipeline(),
    }),
    pluginOrder: ['seo', 'auth'],
    themes: ['default'],
    close: vi.fn().mockResolvedValue(undefined),
  };
}

function createServerHandle(): ServerHandle {
  return {
    start: vi.fn().mockResolvedValue({ address: '127.0.0.1', family: 'IPv4', port: 8080 }),
    stop: vi.fn().mockResolvedValue(undefined),
  };
}

function createTestDeps(overrides?: Partial<CliDeps>): CliDeps {
  const runtime = createRuntime();
  const server = createServerHandle();
  return {
    stdout: vi.fn(),
    stderr: vi.fn(),
    home: HOME,
    loadConfig: vi.fn().mockReturnValue(defaultConfig()),
    setupLogging: vi.fn().mockReturnValue(vi.fn()),
    bootstrap: vi.fn().mockResolvedValue(runtime),
    createServer: vi.fn().mockReturnValue(server),
    waitForShutdown: vi.fn().mockResolvedValue('SIGTERM'),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

describe('parseArgs', () => {
  it('parses the command from argv', () => {
    expect(parseArgs(['node', 'plinth', 'serve'])).toEqual({ command: 'serve', flags: {} });
  });

  it('returns an empty command when none is given', () => {
    expect(parseArgs(['node', 'plinth']).command).toBe('');
  });

  it('collects flags wherever they appear', () => {
    const result = parseArgs(['node', 'plinth', '--debug', 'serve', 'extra']);
    expect(result).toEqual({ command: 'serve', flags: { debug: true } });
  });
});

// ---------------------------------------------------------------------------
// runCommand
// ---------------------------------------------------------------------------

describe('runCommand', () => {
  it('shows usage for unknown commands', async () => {
    const deps = createTestDeps();
    const code = await runCommand('unknown', deps);
    expect(code).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith('Unknown command: "unknown"\n');
  });

  it('shows usage for an empty command', async () => {
    const deps = createTestDeps();
    const code = await runCommand('', deps);
    expect(code).toBe(0);
    expect(deps.stdout).toHaveBeenCalledWith(expect.stringContaining('Usage: plinth <command>'));
  });

  it('shows the version', async () => {
    const deps = createTestDeps();
    const code = await runCommand('--version', deps);
    expect(code).toBe(0);
    expect(deps.stdout).toHaveBeenCalledWith(VERSION);
  });

  it('dispatches check', async () => {
    const deps = createTestDeps();
    expect(await runCommand('check', deps)).toBe(0);
    expect(deps.bootstrap).toHaveBeenCalledOnce();
  });
});

// ---------------------------------------------------------------------------
// serve
// ---------------------------------------------------------------------------

describe('serve', () => {
  it('starts the server, waits for a signal, then stops everything', async () => {
    const runtime = createRuntime();
    const server = createServerHandle();
    const release = vi.fn();
    const deps = createTestDeps({
      bootstrap: vi.fn().mockResolvedValue(runtime),
      createServer: vi.fn().mockReturnValue(server),
      setupLogging: vi.fn().mockReturnValue(release),
    });

    const code = await serve(deps);

    expect(code).toBe(0);
    expect(deps.createServer).toHaveBeenCalledWith(defaultConfig().server, runtime);
    expect(deps.stdout).toHaveBeenCalledWith(`plinth ${VERSION} listening on 127.0.0.1:8080`);
    expect(deps.stdout).toHaveBeenCalledWith('  Plugins: seo, auth');
    expect(deps.stdout).toHaveBeenCalledWith('Received SIGTERM, shutting down');
    expect(server.stop).toHaveBeenCalledOnce();
    expect(runtime.close).toHaveBeenCalledOnce();
    expect(release).toHaveBeenCalledOnce();
  });

  it('passes --debug to the logging setup', async () => {
    const deps = createTestDeps();
    await serve(deps, { debug: true });
    expect(deps.setupLogging).toHaveBeenCalledWith(defaultConfig(), true);
  });

  it('fails on invalid configuration before touching logging', async () => {
    const deps = createTestDeps({
      loadConfig: vi.fn().mockImplementation(() => {
        throw new Error('server.port must be a positive integer');
      }),
    });

    expect(await serve(deps)).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith(
      `Invalid configuration in ${HOME}: server.port must be a positive integer`,
    );
    expect(deps.setupLogging).not.toHaveBeenCalled();
  });

  it('reports a bootstrap failure with its code', async () => {
    const deps = createTestDeps({
      bootstrap: vi
        .fn()
        .mockRejectedValue(new CoreError(ErrorCode.THEME_BOOTSTRAP, 'theme "x" failed')),
    });

    expect(await serve(deps)).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith('Startup failed: THEME_BOOTSTRAP: theme "x" failed');
    expect(deps.createServer).not.toHaveBeenCalled();
  });

  it('closes the runtime when the server cannot bind', async () => {
    const runtime = createRuntime();
    const server = createServerHandle();
    vi.mocked(server.start).mockRejectedValue(new Error('listen EADDRINUSE'));
    const deps = createTestDeps({
      bootstrap: vi.fn().mockResolvedValue(runtime),
      createServer: vi.fn().mockReturnValue(server),
    });

    expect(await serve(deps)).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith('Server failed: listen EADDRINUSE');
    expect(runtime.close).toHaveBeenCalledOnce();
    expect(deps.waitForShutdown).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

describe('check', () => {
  it('reports what bootstrap loaded and closes the runtime', async () => {
    const runtime = createRuntime();
    const deps = createTestDeps({ bootstrap: vi.fn().mockResolvedValue(runtime) });

    expect(await check(deps)).toBe(0);
    expect(vi.mocked(deps.stdout).mock.calls).toEqual([
      [`  PASS  config: ${HOME}/config.toml`],
      ['  PASS  plugins: seo, auth'],
      ['  PASS  themes: default'],
    ]);
    expect(runtime.close).toHaveBeenCalledOnce();
  });

  it('fails on a bootstrap error', async () => {
    const deps = createTestDeps({
      bootstrap: vi
        .fn()
        .mockRejectedValue(new CoreError(ErrorCode.PLUGIN_BOOTSTRAP, 'plugin "seo" failed')),
    });

    expect(await check(deps)).toBe(1);
    expect(deps.stderr).toHaveBeenCalledWith('  FAIL  PLUGIN_BOOTSTRAP: plugin "seo" failed');
  });
});
