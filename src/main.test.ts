/**
 * Tests for main() entry point.
 *
 * main() is a thin wiring layer that parses args, creates real CliDeps,
 * calls runCommand, and returns the exit code. Tests verify the wiring
 * works without serving anything.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { main } from './main.js';
import { resetLogging } from './core/logger.js';

// Mock cli.ts to intercept runCommand calls
vi.mock('./cli.js', async () => {
  const actual = await vi.importActual<typeof import('./cli.js')>('./cli.js');
  return {
    ...actual,
    runCommand: vi.fn().mockResolvedValue(0),
  };
});

import { runCommand } from './cli.js';

describe('main', () => {
  afterEach(() => {
    vi.clearAllMocks();
    resetLogging();
  });

  it('calls runCommand with the parsed command and returns its exit code', async () => {
    const code = await main(['node', 'plinth', 'serve']);
    expect(runCommand).toHaveBeenCalledWith('serve', expect.any(Object), {});
    expect(code).toBe(0);
  });

  it('passes --version through as the command', async () => {
    await main(['node', 'plinth', '--version']);
    expect(runCommand).toHaveBeenCalledWith('--version', expect.any(Object), { version: true });
  });

  it('passes --help through as the command', async () => {
    await main(['node', 'plinth', '--help']);
    expect(runCommand).toHaveBeenCalledWith('--help', expect.any(Object), { help: true });
  });

  it('keeps flags next to a real command', async () => {
    await main(['node', 'plinth', 'serve', '--debug']);
    expect(runCommand).toHaveBeenCalledWith('serve', expect.any(Object), { debug: true });
  });

  it('returns a non-zero exit code on failure', async () => {
    vi.mocked(runCommand).mockResolvedValueOnce(1);
    expect(await main(['node', 'plinth', 'bogus'])).toBe(1);
  });

  it('resolves the home directory from PLINTH_HOME', async () => {
    vi.stubEnv('PLINTH_HOME', '/srv/site');
    try {
      await main(['node', 'plinth', 'check']);
      expect(vi.mocked(runCommand).mock.calls[0][1].home).toBe('/srv/site');
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
