/**
 * Interactive front ends and the fallback rule between them.
 */

import type { DuckqConfig } from '../config.js';
import type { FrontEndChoice } from '../types.js';
import type { ExecutableLocator } from '../utils/executable.js';

/**
 * How to launch one front end with an init script.
 */
export interface FrontEnd {
  choice: FrontEndChoice;
  /** Human-readable name for log output */
  label: string;
  executable: string;
  /** Command-line arguments that make the front end run `scriptPath` on startup */
  initArgs(scriptPath: string): string[];
}

export type FrontEndRegistry = Readonly<Record<FrontEndChoice, FrontEnd>>;

export function createFrontEnds(config: Pick<DuckqConfig, 'duckdbBin' | 'harlequinBin'>): FrontEndRegistry {
  return {
    primary: {
      choice: 'primary',
      label: 'DuckDB CLI',
      executable: config.duckdbBin,
      initArgs: scriptPath => ['-init', scriptPath],
    },
    alternate: {
      choice: 'alternate',
      label: 'Harlequin',
      executable: config.harlequinBin,
      initArgs: scriptPath => ['--init-path', scriptPath],
    },
  };
}

export interface FrontEndResolution {
  /** The front end that will actually be launched */
  actual: FrontEndChoice;
  /** True when `alternate` was requested but is not installed */
  downgraded: boolean;
}

/**
 * Resolves a requested front end to one that can be launched.
 *
 * The primary shell is never probed. When the alternate one is missing from
 * the search path this falls back to primary and reports `downgraded`; the
 * caller is responsible for warning about it and for building the init script
 * against `actual`.
 */
export function resolveFrontEnd(
  requested: FrontEndChoice,
  locator: ExecutableLocator,
  frontEnds: FrontEndRegistry
): FrontEndResolution {
  if (requested === 'primary') {
    return { actual: 'primary', downgraded: false };
  }

  if (locator.exists(frontEnds.alternate.executable)) {
    return { actual: 'alternate', downgraded: false };
  }

  return { actual: 'primary', downgraded: true };
}
