/**
 * Foreground child processes attached to the user's terminal.
 */

import { spawnSync } from 'node:child_process';

/**
 * What happened to a launched process. Exactly one of `error`, `signal` or a
 * numeric `status` describes the ending.
 */
export interface LaunchResult {
  /** Exit code, or null when the process was killed or never started */
  status: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned (for example ENOENT) */
  error?: Error | undefined;
}

export interface ProcessLauncher {
  /**
   * Runs `command` to completion with inherited stdio and reports how it ended.
   */
  launch(command: string, args: readonly string[]): LaunchResult;
}

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGQUIT'];

function ignoreSignal(): void {}

/**
 * Blocks until the child exits.
 *
 * Terminal interrupts go to the whole foreground process group. While the
 * child runs they are ignored here, so an interrupted session still returns
 * control to the caller for cleanup.
 */
export const spawnLauncher: ProcessLauncher = {
  launch(command, args) {
    FORWARDED_SIGNALS.forEach(signal => process.on(signal, ignoreSignal));
    try {
      const result = spawnSync(command, args, { stdio: 'inherit' });
      return {
        status: result.status,
        signal: result.signal,
        error: result.error,
      };
    } finally {
      FORWARDED_SIGNALS.forEach(signal => process.off(signal, ignoreSignal));
    }
  },
};
