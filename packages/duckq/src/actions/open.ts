/**
 * CLI action handler for the open command.
 */

import { openDataset, prepareSession, type OpenOptions } from '../commands/open.js';
import { loadConfig } from '../config.js';
import { renderInitScript } from '../core/script.js';
import { exitCodeFor } from '../core/session.js';
import { FORMAT_KINDS, FRONT_END_CHOICES, type FormatKind, type FrontEndChoice } from '../types.js';
import { toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ActionContext } from './context.js';

/**
 * Options for the open action, as commander parses them.
 */
export interface OpenActionOptions {
  type: string;
  profile?: string;
  ui: string;
  printScript: boolean;
  verbose: boolean;
}

function parseFormat(value: string): FormatKind | 'auto' {
  const format = value.toLowerCase();
  if (format === 'auto') {
    return format;
  }
  const match = FORMAT_KINDS.find(kind => kind === format);
  if (match === undefined) {
    throw new Error(`Unknown file type "${value}" (expected csv, parquet or auto)`);
  }
  return match;
}

function parseFrontEnd(value: string): FrontEndChoice {
  const match = FRONT_END_CHOICES.find(choice => choice === value.toLowerCase());
  if (match === undefined) {
    throw new Error(`Unknown UI "${value}" (expected primary or alternate)`);
  }
  return match;
}

/**
 * Handles the open CLI command.
 * Either prints the init script (`--print-script`) or runs an interactive session.
 *
 * @returns The exit code for the process
 */
export function handleOpenAction(reference: string, options: OpenActionOptions, context: ActionContext): number {
  try {
    const config = loadConfig(context.env);
    const logger = createLogger({
      level: options.verbose ? 'debug' : config.logLevel,
      timestamps: config.logTimestamps,
      // Keep stdout clean for the script itself.
      stdout: options.printScript ? context.stderr : context.stdout,
      stderr: context.stderr,
    });

    const openOptions: OpenOptions = {
      reference,
      format: parseFormat(options.type),
      profile: options.profile,
      ui: parseFrontEnd(options.ui),
    };
    const deps = { config, logger, locator: context.locator, launcher: context.launcher };

    if (options.printScript) {
      const session = prepareSession(openOptions, deps);
      context.stdout(renderInitScript(session.script));
      return 0;
    }

    return exitCodeFor(openDataset(openOptions, deps));
  } catch (error) {
    context.stderr(`Error: ${toError(error).message}`);
    return 1;
  }
}
