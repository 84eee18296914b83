import { describe, it, expect } from 'vitest';
import type { FrontEnd } from '../core/frontend.js';
import { runSession } from '../core/session.js';
import { createCaptureLogger } from '../testing/capture-logger.js';
import { useTempDir } from '../testing/temp-dir.js';
import { spawnLauncher } from '../utils/process.js';

// Interrupts the launching process the way Ctrl-C would, then keeps running.
const INTERRUPT_THEN_EXIT = 'kill -INT $PPID; sleep 0.2; exit 4';

describe('spawnLauncher', () => {
  it('should report the exit status of the child', () => {
    if (process.platform === 'win32') return;

    expect(spawnLauncher.launch('sh', ['-c', 'exit 0'])).toEqual({ status: 0, signal: null, error: undefined });
    expect(spawnLauncher.launch('sh', ['-c', 'exit 7']).status).toBe(7);
  });

  it('should wait for the child when interrupted and restore signal listeners', () => {
    if (process.platform === 'win32') return;
    const sigint = process.listenerCount('SIGINT');
    const sigquit = process.listenerCount('SIGQUIT');

    const result = spawnLauncher.launch('sh', ['-c', INTERRUPT_THEN_EXIT]);

    expect(result.status).toBe(4);
    expect(result.signal).toBeNull();
    expect(process.listenerCount('SIGINT')).toBe(sigint);
    expect(process.listenerCount('SIGQUIT')).toBe(sigquit);
  });

  it('should report a spawn error for a missing program', () => {
    const result = spawnLauncher.launch('duckq-test-no-such-binary', []);

    expect(result.status).toBeNull();
    expect(result.error).toBeInstanceOf(Error);
  });
});

describe('runSession with an interrupted front end', () => {
  const ctx = useTempDir({ prefix: 'duckq-interrupt-test' });

  it('should return after the front end exits and remove the script file', async () => {
    if (process.platform === 'win32') return;
    const capture = createCaptureLogger();
    // `sh -c cmd path` exposes the script path as $0.
    const frontEnd: FrontEnd = {
      choice: 'primary',
      label: 'Test shell',
      executable: 'sh',
      initArgs: scriptPath => ['-c', 'kill -INT $PPID; sleep 0.2; test -f "$0" && exit 4; exit 5', scriptPath],
    };

    const outcome = runSession({
      script: ["PRAGMA table_info('data');"],
      frontEnd,
      launcher: spawnLauncher,
      logger: capture.logger,
      tempDir: ctx.testDir,
    });

    expect(outcome).toEqual({ kind: 'process-failed', exitCode: 4 });
    expect(capture.errors()).toEqual(['Error: Test shell process failed with exit code 4']);
    expect(await ctx.list()).toEqual([]);
  });
});
