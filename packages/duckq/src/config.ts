/**
 * Environment-driven configuration.
 */

import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from './utils/errors.js';
import { isLogLevel, LOG_LEVEL_NAMES, type LogLevel } from './utils/logger.js';

export interface DuckqConfig {
  /** Executable for the native DuckDB shell */
  duckdbBin: string;
  /** Executable for the Harlequin UI */
  harlequinBin: string;
  logLevel: LogLevel;
  logTimestamps: boolean;
  /** Directory the transient init script is written to */
  tempDir: string;
  awsConfigFile: string;
  awsCredentialsFile: string;
}

type Env = Readonly<Record<string, string | undefined>>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

function parseBoolean(name: string, value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  switch (value.trim().toLowerCase()) {
    case '':
    case '0':
    case 'false':
    case 'no':
      return false;
    case '1':
    case 'true':
    case 'yes':
      return true;
    default:
      throw new ConfigError(name, `expected true or false, got "${value}"`);
  }
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = nonEmpty(value)?.trim().toLowerCase();
  if (level === undefined) {
    return 'info';
  }
  if (!isLogLevel(level)) {
    throw new ConfigError(
      'DUCKQ_LOG_LEVEL',
      `unknown level "${value}" (expected one of: ${LOG_LEVEL_NAMES.join(', ')})`
    );
  }
  return level;
}

/**
 * Builds the configuration from environment variables.
 *
 * @throws ConfigError when a variable is set to an unusable value
 */
export function loadConfig(env: Env = process.env): DuckqConfig {
  const awsDir = join(homedir(), '.aws');

  return {
    duckdbBin: nonEmpty(env['DUCKQ_DUCKDB_BIN']) ?? 'duckdb',
    harlequinBin: nonEmpty(env['DUCKQ_HARLEQUIN_BIN']) ?? 'harlequin',
    logLevel: parseLogLevel(env['DUCKQ_LOG_LEVEL']),
    logTimestamps: parseBoolean('DUCKQ_LOG_TIMESTAMPS', env['DUCKQ_LOG_TIMESTAMPS']),
    tempDir: nonEmpty(env['DUCKQ_TMPDIR']) ?? tmpdir(),
    awsConfigFile: nonEmpty(env['AWS_CONFIG_FILE']) ?? join(awsDir, 'config'),
    awsCredentialsFile: nonEmpty(env['AWS_SHARED_CREDENTIALS_FILE']) ?? join(awsDir, 'credentials'),
  };
}
