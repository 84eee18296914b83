import type { DuckqConfig } from '../config.js';
import { detectFormat } from '../core/format.js';
import { createFrontEnds, resolveFrontEnd, type FrontEnd } from '../core/frontend.js';
import { buildInitScript } from '../core/script.js';
import { runSession } from '../core/session.js';
import { classifySource } from '../core/source.js';
import type { ExitOutcome, FormatKind, FrontEndChoice, InitScript, SourceDescriptor } from '../types.js';
import type { ExecutableLocator } from '../utils/executable.js';
import type { Logger } from '../utils/logger.js';
import type { ProcessLauncher } from '../utils/process.js';

export interface OpenOptions {
  /** Local path or `s3://` URI */
  reference: string;
  /** `auto` infers the format from the reference's extension */
  format: FormatKind | 'auto';
  profile?: string | undefined;
  ui: FrontEndChoice;
}

export interface OpenDependencies {
  config: DuckqConfig;
  logger: Logger;
  locator: ExecutableLocator;
  launcher: ProcessLauncher;
}

export interface PreparedSession {
  source: SourceDescriptor;
  format: FormatKind;
  frontEnd: FrontEnd;
  /** True when the requested UI was unavailable and the DuckDB shell is used instead */
  downgraded: boolean;
  script: InitScript;
}

/**
 * Everything short of launching: classify the source, settle the format,
 * pick a front end that exists and build the script for it.
 *
 * @throws UnsupportedFormatError when `format` is `auto` and the extension is unknown
 */
export function prepareSession(options: OpenOptions, deps: Omit<OpenDependencies, 'launcher'>): PreparedSession {
  const { config, logger, locator } = deps;
  const source = classifySource(options.reference);
  const format = options.format === 'auto' ? detectFormat(source) : options.format;

  logger.info(`Initializing query for ${format.toUpperCase()} file: ${source.reference}`);

  const frontEnds = createFrontEnds(config);
  const { actual, downgraded } = resolveFrontEnd(options.ui, locator, frontEnds);
  if (downgraded) {
    logger.warn(
      `${frontEnds.alternate.label} ("${frontEnds.alternate.executable}") was not found on PATH. ` +
        `Falling back to ${frontEnds.primary.label}.`
    );
  }

  const script = buildInitScript({
    source,
    format,
    profile: options.profile,
    frontEnd: actual,
    logger,
  });

  return { source, format, frontEnd: frontEnds[actual], downgraded, script };
}

/**
 * Opens the dataset in an interactive session and waits for the user to quit.
 */
export function openDataset(options: OpenOptions, deps: OpenDependencies): ExitOutcome {
  const { config, logger, launcher } = deps;
  const session = prepareSession(options, deps);

  const location = session.source.kind === 'object-storage' ? 'S3' : 'local file';
  logger.info(`Loading ${session.format.toUpperCase()} from ${location}: ${session.source.reference}`);

  const outcome = runSession({
    script: session.script,
    frontEnd: session.frontEnd,
    launcher,
    logger,
    tempDir: config.tempDir,
  });

  logger.info(`Exited ${session.frontEnd.label}. To query again, rerun the command.`);
  return outcome;
}
