/**
 * plinth CLI.
 *
 * Provides the `plinth` command with subcommands:
 *   - `serve`: bootstrap plugins and themes, then serve HTTP until
 *     SIGINT or SIGTERM.
 *   - `check`: load config, plugins, themes and templates, report what
 *     was found, and exit.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import type { AddressInfo } from 'node:net';
import { VERSION } from './index.js';
import type { PlinthConfig, ServerConfig } from './types/config.js';
import type { Runtime } from './core/bootstrap.js';
import { errorMessage, isCoreError } from './core/core-error.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

export interface ServerHandle {
  start: () => Promise<AddressInfo>;
  stop: () => Promise<void>;
}

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Resolved PLINTH_HOME path. */
  home: string;
  /** Load and validate config from PLINTH_HOME. */
  loadConfig: (home: string) => PlinthConfig;
  /**
   * Apply the `[logging]` section; `debug` forces the debug level.
   * Returns a function that releases any file sink.
   */
  setupLogging: (config: PlinthConfig, debug: boolean) => () => void;
  bootstrap: (home: string, config: PlinthConfig) => Promise<Runtime>;
  createServer: (config: ServerConfig, runtime: Runtime) => ServerHandle;
  /** Resolves with the signal name once the process is asked to stop. */
  waitForShutdown: () => Promise<string>;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  flags: Record<string, boolean>;
}

/**
 * Parse process.argv into a command and flags.
 *
 * Expects argv in the form: [node, script, command?, ...flags]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  let command = '';

  for (const arg of args) {
    if (arg.startsWith('--')) {
      flags[arg.slice(2)] = true;
    } else if (!command) {
      command = arg;
    }
  }

  return { command, flags };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: plinth <command>

Commands:
  serve        Load plugins and themes and serve HTTP
  check        Validate configuration, plugins, themes and templates

Options:
  --debug      Log at debug level
  --version    Show version number
  --help       Show this help message

Environment:
  PLINTH_HOME  Home directory holding config.toml (default: ~/.plinth)`;

/**
 * Dispatch a command string to the appropriate handler.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(
  command: string,
  deps: CliDeps,
  flags: Record<string, boolean> = {},
): Promise<number> {
  if (command === '--version') {
    deps.stdout(VERSION);
    return 0;
  }

  if (command === '' || command === '--help') {
    deps.stdout(USAGE);
    return 0;
  }

  switch (command) {
    case 'serve':
      return serve(deps, flags);
    case 'check':
      return check(deps);
    default:
      deps.stderr(`Unknown command: "${command}"\n`);
      deps.stdout(USAGE);
      return 1;
  }
}

function describeError(err: unknown): string {
  return isCoreError(err) ? `${err.code}: ${err.message}` : errorMessage(err);
}

function readConfig(deps: CliDeps): PlinthConfig | null {
  try {
    return deps.loadConfig(deps.home);
  } catch (err) {
    deps.stderr(`Invalid configuration in ${deps.home}: ${errorMessage(err)}`);
    return null;
  }
}

// ---------------------------------------------------------------------------
// serve
// ---------------------------------------------------------------------------

/**
 * Start serving.
 *
 * 1. Load and validate configuration.
 * 2. Route logging as configured.
 * 3. Bootstrap plugins, themes and the request processor.
 * 4. Bind the HTTP server.
 * 5. Block until SIGINT/SIGTERM, then stop the server and the engines.
 */
export async function serve(deps: CliDeps, flags: Record<string, boolean> = {}): Promise<number> {
  const config = readConfig(deps);
  if (config === null) return 1;

  const releaseLogging = deps.setupLogging(config, flags['debug'] === true);
  try {
    let runtime: Runtime;
    try {
      runtime = await deps.bootstrap(deps.home, config);
    } catch (err) {
      deps.stderr(`Startup failed: ${describeError(err)}`);
      return 1;
    }

    const server = deps.createServer(config.server, runtime);
    try {
      const address = await server.start();
      deps.stdout(`plinth ${VERSION} listening on ${address.address}:${address.port}`);
      deps.stdout(`  Home:    ${deps.home}`);
      deps.stdout(`  Plugins: ${listOrNone(runtime.pluginOrder)}`);
      deps.stdout(`  Themes:  ${listOrNone(runtime.themes)}`);

      const signal = await deps.waitForShutdown();
      deps.stdout(`Received ${signal}, shutting down`);
      return 0;
    } catch (err) {
      deps.stderr(`Server failed: ${describeError(err)}`);
      return 1;
    } finally {
      await server.stop();
      await runtime.close();
    }
  } finally {
    releaseLogging();
  }
}

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

/**
 * Bootstrap everything `serve` would, report it, and shut down again.
 * Exits non-zero on the first configuration or bootstrap error.
 */
export async function check(deps: CliDeps): Promise<number> {
  const config = readConfig(deps);
  if (config === null) return 1;

  let runtime: Runtime;
  try {
    runtime = await deps.bootstrap(deps.home, config);
  } catch (err) {
    deps.stderr(`  FAIL  ${describeError(err)}`);
    return 1;
  }

  try {
    deps.stdout(`  PASS  config: ${runtime.paths.configFile}`);
    deps.stdout(`  PASS  plugins: ${listOrNone(runtime.pluginOrder)}`);
    deps.stdout(`  PASS  themes: ${listOrNone(runtime.themes)}`);
    return 0;
  } finally {
    await runtime.close();
  }
}

function listOrNone(ids: readonly string[]): string {
  return ids.length > 0 ? ids.join(', ') : '(none)';
}
