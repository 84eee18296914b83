/**
 * Runs one interactive session: writes the init script to a temp file,
 * launches the front end on it, and removes the file whatever happens.
 */

import { randomUUID } from 'node:crypto';
import { rmSync, writeFileSync } from 'node:fs';
import { constants } from 'node:os';
import { join } from 'node:path';
import type { ExitOutcome, InitScript } from '../types.js';
import { describeError, getErrorCode, getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { LaunchResult, ProcessLauncher } from '../utils/process.js';
import type { FrontEnd } from './frontend.js';
import { renderInitScript } from './script.js';

/**
 * A temp file holding a rendered init script, owned by one session.
 */
export interface TransientScript {
  readonly path: string;
  /**
   * Deletes the file. Failures are logged as warnings, never thrown; calling
   * it again is a no-op.
   */
  dispose(): void;
}

/**
 * Writes `script` to a new, owner-only `.sql` file under `dir`.
 */
export function createTransientScript(script: InitScript, dir: string, logger: Logger): TransientScript {
  const path = join(dir, `duckq-${randomUUID()}.sql`);

  try {
    writeFileSync(path, renderInitScript(script), { encoding: 'utf-8', mode: 0o600, flag: 'wx' });
  } catch (error) {
    // A partial write leaves a file behind; EEXIST means it was never ours.
    if (getErrorCode(error) !== 'EEXIST') {
      rmSync(path, { force: true });
    }
    throw error;
  }
  logger.debug(`Created temporary SQL file: ${path}`);

  let disposed = false;
  return {
    path,
    dispose() {
      if (disposed) {
        return;
      }
      disposed = true;
      try {
        rmSync(path);
        logger.debug(`Deleted temporary file: ${path}`);
      } catch (error) {
        logger.warn(`Could not delete temporary file ${path}: ${getErrorMessage(error)}`);
      }
    },
  };
}

export interface RunSessionOptions {
  script: InitScript;
  frontEnd: FrontEnd;
  launcher: ProcessLauncher;
  logger: Logger;
  /** Directory for the transient script */
  tempDir: string;
}

const SIGNAL_NUMBERS: Readonly<Record<string, number | undefined>> = { ...constants.signals };

function signalNumber(signal: NodeJS.Signals): number {
  return SIGNAL_NUMBERS[signal] ?? 0;
}

function interpretLaunch(result: LaunchResult, frontEnd: FrontEnd, logger: Logger): ExitOutcome {
  if (result.error) {
    if (getErrorCode(result.error) === 'ENOENT') {
      logger.error(
        `${frontEnd.label} executable "${frontEnd.executable}" not found. ` +
          `Please ensure ${frontEnd.label} is installed and in your PATH.`
      );
      return { kind: 'executable-not-found', executable: frontEnd.executable };
    }
    throw result.error;
  }

  if (result.signal !== null) {
    logger.error(`${frontEnd.label} process was terminated by ${result.signal}`);
    return { kind: 'process-failed', exitCode: 128 + signalNumber(result.signal) };
  }

  if (result.status === null) {
    throw new Error(`${frontEnd.label} process ended without an exit status`);
  }

  if (result.status !== 0) {
    logger.error(`${frontEnd.label} process failed with exit code ${result.status}`);
    return { kind: 'process-failed', exitCode: result.status };
  }

  logger.info(`${frontEnd.label} session completed successfully.`);
  return { kind: 'success' };
}

/**
 * Launches `frontEnd` in the foreground with `script` as its init script and
 * blocks until it exits.
 *
 * Never throws: every failure, including one while writing the temp file,
 * becomes an {@link ExitOutcome}, and the temp file is removed on every path.
 */
export function runSession(options: RunSessionOptions): ExitOutcome {
  const { script, frontEnd, launcher, logger, tempDir } = options;
  let transient: TransientScript | undefined;

  try {
    transient = createTransientScript(script, tempDir, logger);
    logger.info(`Initializing ${frontEnd.label}...`);
    const result = launcher.launch(frontEnd.executable, frontEnd.initArgs(transient.path));
    return interpretLaunch(result, frontEnd, logger);
  } catch (error) {
    logger.error(`An unexpected error occurred: ${describeError(error)}`);
    return { kind: 'unexpected-error', detail: getErrorMessage(error) };
  } finally {
    transient?.dispose();
  }
}

/**
 * Process exit code for a session outcome: the child's own code when it
 * failed, 1 when it never ran properly.
 */
export function exitCodeFor(outcome: ExitOutcome): number {
  switch (outcome.kind) {
    case 'success':
      return 0;
    case 'process-failed':
      return outcome.exitCode;
    case 'executable-not-found':
    case 'unexpected-error':
      return 1;
  }
}
