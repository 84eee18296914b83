#!/usr/bin/env node

/**
 * duckq - open a CSV or Parquet file, local or on S3, in an interactive DuckDB session.
 *
 * Provides commands for:
 * - `open` (default) - load a dataset into a `data` table and start the DuckDB shell or Harlequin
 * - `profiles` - list the AWS profiles `--profile` can name
 *
 * @module duckq
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, Option } from 'commander';
import { createDefaultContext, handleOpenAction, handleProfilesAction, type ActionContext } from './actions/index.js';
import { FORMAT_KINDS, FRONT_END_CHOICES } from './types.js';

/**
 * Creates and configures the duckq CLI program.
 *
 * @param context - Process collaborators; defaults to the real environment, PATH and terminal
 *
 * @example
 * ```typescript
 * const program = createCLI();
 * program.parse(process.argv);
 *
 * // Or use programmatically
 * await createCLI().parseAsync(['node', 'duckq', 's3://bucket/trips.parquet', '--type', 'parquet', '--print-script']);
 * ```
 */
export function createCLI(context: ActionContext = createDefaultContext()): Command {
  const program = new Command();

  // Keep in sync with package.json.
  program
    .name('duckq')
    .version('0.1.0')
    .description('Query CSV or Parquet files, local or on S3, using DuckDB');

  program
    .command('open', { isDefault: true })
    .description('Load a file into a DuckDB table and start an interactive session')
    .argument('<reference>', 'Path to the file (local) or S3 URI')
    .addOption(
      new Option('--type <type>', 'File type; auto infers it from the extension')
        .choices([...FORMAT_KINDS, 'auto'])
        .default('csv')
    )
    .option('--profile <name>', 'AWS profile name for S3 access')
    .addOption(
      new Option('--ui <ui>', 'Interactive front end: primary (DuckDB CLI) or alternate (Harlequin)')
        .choices([...FRONT_END_CHOICES])
        .default('primary')
    )
    .option('--print-script', 'Print the generated init script instead of starting a session', false)
    .option('-v, --verbose', 'Show debug output', false)
    .action((reference: string, options) => {
      const code = handleOpenAction(reference, options, context);
      if (code !== 0) {
        context.exit(code);
      }
    });

  program
    .command('profiles')
    .description('List AWS profiles from the shared config and credentials files')
    .action(async () => {
      const code = await handleProfilesAction(context);
      if (code !== 0) {
        context.exit(code);
      }
    });

  return program;
}

// Export components for programmatic use
export { classifySource, OBJECT_STORAGE_SCHEME } from './core/source.js';
export { detectFormat, readerFunction } from './core/format.js';
export { buildInitScript, renderInitScript, TABLE_NAME, type BuildScriptOptions } from './core/script.js';
export {
  createFrontEnds,
  resolveFrontEnd,
  type FrontEnd,
  type FrontEndRegistry,
  type FrontEndResolution,
} from './core/frontend.js';
export {
  createTransientScript,
  exitCodeFor,
  runSession,
  type RunSessionOptions,
  type TransientScript,
} from './core/session.js';
export {
  openDataset,
  prepareSession,
  type OpenDependencies,
  type OpenOptions,
  type PreparedSession,
} from './commands/open.js';
export { listProfiles, parseProfileNames, type ListProfilesOptions } from './commands/profiles.js';
export { loadConfig, type DuckqConfig } from './config.js';
export { createLogger, Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { PathExecutableLocator, type ExecutableLocator } from './utils/executable.js';
export { spawnLauncher, type LaunchResult, type ProcessLauncher } from './utils/process.js';
export { ConfigError, DuckqError, UnsupportedFormatError } from './utils/errors.js';
export type * from './types.js';

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run CLI if invoked directly
if (isMainModule()) {
  void createCLI().parseAsync();
}
