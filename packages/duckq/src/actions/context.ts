/**
 * Process-level collaborators the CLI actions run against.
 * Tests substitute fakes for each.
 */

import { PathExecutableLocator, type ExecutableLocator } from '../utils/executable.js';
import { spawnLauncher, type ProcessLauncher } from '../utils/process.js';

export interface ActionContext {
  env: Readonly<Record<string, string | undefined>>;
  locator: ExecutableLocator;
  launcher: ProcessLauncher;
  stdout: (...args: unknown[]) => void;
  stderr: (...args: unknown[]) => void;
  /** Called with a non-zero code when an action fails */
  exit: (code: number) => void;
}

export function createDefaultContext(): ActionContext {
  return {
    env: process.env,
    locator: new PathExecutableLocator(),
    launcher: spawnLauncher,
    stdout: console.log,
    stderr: console.error,
    exit: code => process.exit(code),
  };
}
