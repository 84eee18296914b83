/**
 * Init script synthesis.
 *
 * Statement order is fixed: extension setup, credentials, table load,
 * presentation settings, introspection. DuckDB needs the extension loaded
 * before `load_aws_credentials` resolves, and the table must exist before
 * `table_info` runs.
 */

import type { FormatKind, FrontEndChoice, InitScript, SourceDescriptor } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { readerFunction } from './format.js';

/** Name of the table the dataset is loaded into */
export const TABLE_NAME = 'data';

export interface BuildScriptOptions {
  source: SourceDescriptor;
  format: FormatKind;
  /** AWS profile passed to `load_aws_credentials`; ignored for local sources, absent when empty */
  profile?: string | undefined;
  /** The resolved front end, after any fallback */
  frontEnd: FrontEndChoice;
  logger: Logger;
}

/**
 * Builds the statements the front end runs before handing control to the user.
 *
 * The reference and profile are embedded verbatim inside single quotes; a
 * value containing `'` produces invalid SQL.
 */
export function buildInitScript(options: BuildScriptOptions): InitScript {
  const { source, format, profile, frontEnd, logger } = options;
  const statements: string[] = [];

  if (source.kind === 'object-storage') {
    logger.debug('S3 URI detected. Adding AWS extension commands.');
    statements.push('INSTALL aws;', 'LOAD aws;');

    if (profile !== undefined && profile !== '') {
      statements.push(`CALL load_aws_credentials('${profile}');`);
    } else {
      logger.warn('S3 URI detected but no AWS profile specified. Using default credentials.');
    }
  }

  statements.push(
    `CREATE OR REPLACE TABLE ${TABLE_NAME} AS SELECT * FROM ${readerFunction(format)}('${source.reference}');`
  );

  // Dot commands only exist in the native shell.
  if (frontEnd === 'primary') {
    statements.push('.mode box', '.echo on');
  }

  statements.push(`PRAGMA table_info('${TABLE_NAME}');`);

  return statements;
}

/**
 * Serializes a script for the front end: one statement per line, in order.
 */
export function renderInitScript(script: InitScript): string {
  return script.join('\n');
}
