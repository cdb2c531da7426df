/**
 * Production entry point for plinth.
 *
 * Wires real dependencies (config, logging sinks, bootstrap, node:http,
 * process signals) into CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   node dist/main.js serve
 *   node dist/main.js check
 */

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { resolveHome } from './types/config.js';
import { loadConfig, resolvePaths } from './core/config-loader.js';
import { bootstrap } from './core/bootstrap.js';
import { HttpServer } from './core/http-server.js';
import { configureLogging, createFileLogSink, createTeeSink } from './core/logger.js';
import type { LogSink } from './core/logger.js';

// ---------------------------------------------------------------------------
// Process helpers
// ---------------------------------------------------------------------------

const stdoutSink: LogSink = (entry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

/** Resolve with the first SIGINT or SIGTERM received. */
function waitForShutdown(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(). Wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const { command: parsedCommand, flags } = parseArgs(argv);
  const home = resolveHome();

  configureLogging({ level: flags['debug'] ? 'debug' : 'info', sink: stdoutSink });

  // Translate flags to pseudo-commands for runCommand compatibility
  let command = parsedCommand;
  if (!command && flags['version']) {
    command = '--version';
  } else if (!command && flags['help']) {
    command = '--help';
  }

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    home,
    loadConfig: (h: string) => loadConfig(h),
    setupLogging: (config, debug) => {
      const level = debug ? 'debug' : config.logging.level;
      const logFile = resolvePaths(home, config).logFile;
      if (logFile === null) {
        configureLogging({ level, sink: stdoutSink });
        return () => {};
      }
      const fileSink = createFileLogSink(logFile);
      configureLogging({ level, sink: createTeeSink(stdoutSink, fileSink) });
      return () => fileSink.close();
    },
    bootstrap: (h, config) => bootstrap({ home: h, config }),
    createServer: (server, runtime) =>
      new HttpServer({ host: server.host, port: server.port, handler: runtime.processor }),
    waitForShutdown,
  };

  return runCommand(command, deps, flags);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/* c8 ignore next 3 */
main().then((code) => {
  process.exitCode = code;
});
