import { describe, it, expect } from 'vitest';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../config.js';
import { ConfigError } from '../utils/errors.js';

describe('loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      duckdbBin: 'duckdb',
      harlequinBin: 'harlequin',
      logLevel: 'info',
      logTimestamps: false,
      tempDir: tmpdir(),
      awsConfigFile: join(homedir(), '.aws', 'config'),
      awsCredentialsFile: join(homedir(), '.aws', 'credentials'),
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      DUCKQ_DUCKDB_BIN: '/opt/duckdb',
      DUCKQ_HARLEQUIN_BIN: 'hq',
      DUCKQ_LOG_LEVEL: 'WARN',
      DUCKQ_LOG_TIMESTAMPS: 'true',
      DUCKQ_TMPDIR: '/var/tmp',
      AWS_CONFIG_FILE: '/etc/aws/config',
      AWS_SHARED_CREDENTIALS_FILE: '/etc/aws/credentials',
    });

    expect(config).toEqual({
      duckdbBin: '/opt/duckdb',
      harlequinBin: 'hq',
      logLevel: 'warn',
      logTimestamps: true,
      tempDir: '/var/tmp',
      awsConfigFile: '/etc/aws/config',
      awsCredentialsFile: '/etc/aws/credentials',
    });
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ DUCKQ_DUCKDB_BIN: '  ', DUCKQ_LOG_LEVEL: '', DUCKQ_LOG_TIMESTAMPS: '' });

    expect(config.duckdbBin).toBe('duckdb');
    expect(config.logLevel).toBe('info');
    expect(config.logTimestamps).toBe(false);
  });

  it.each([
    ['1', true],
    ['yes', true],
    ['0', false],
    ['no', false],
    ['FALSE', false],
  ])('should parse DUCKQ_LOG_TIMESTAMPS=%s as %s', (value, expected) => {
    expect(loadConfig({ DUCKQ_LOG_TIMESTAMPS: value }).logTimestamps).toBe(expected);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ DUCKQ_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig({ DUCKQ_LOG_LEVEL: 'loud' })).toThrow(
      'DUCKQ_LOG_LEVEL: unknown level "loud" (expected one of: debug, info, warn, error, silent)'
    );
  });

  it('should reject a malformed boolean', () => {
    expect(() => loadConfig({ DUCKQ_LOG_TIMESTAMPS: 'sometimes' })).toThrow(
      'DUCKQ_LOG_TIMESTAMPS: expected true or false, got "sometimes"'
    );
  });
});
