import { describe, it, expect } from 'vitest';
import { createLogger, formatTimestamp, isLogLevel } from '../utils/logger.js';

function capture() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    sinks: {
      stdout: (...args: unknown[]) => stdout.push(args.join(' ')),
      stderr: (...args: unknown[]) => stderr.push(args.join(' ')),
    },
  };
}

describe('Logger', () => {
  it('should route info to stdout and warnings and errors to stderr', () => {
    const out = capture();
    const logger = createLogger(out.sinks);

    logger.info('Loading CSV');
    logger.warn('Using default credentials.');
    logger.error('DuckDB CLI process failed with exit code 1');

    expect(out.stdout).toEqual(['Loading CSV']);
    expect(out.stderr).toEqual([
      'Warning: Using default credentials.',
      'Error: DuckDB CLI process failed with exit code 1',
    ]);
  });

  it('should filter messages below the configured level', () => {
    const out = capture();
    const logger = createLogger({ level: 'warn', ...out.sinks });

    logger.debug('hidden');
    logger.info('hidden');
    logger.list(['hidden']);
    logger.warn('shown');

    expect(out.stdout).toEqual([]);
    expect(out.stderr).toEqual(['Warning: shown']);
  });

  it('should prefix debug output', () => {
    const out = capture();
    createLogger({ level: 'debug', ...out.sinks }).debug('Created temporary SQL file: /tmp/x.sql');

    expect(out.stdout).toEqual(['[DEBUG] Created temporary SQL file: /tmp/x.sql']);
  });

  it('should output nothing when silent', () => {
    const out = capture();
    const logger = createLogger({ level: 'silent', ...out.sinks });

    logger.error('hidden');
    logger.section('hidden');

    expect(out.stdout).toEqual([]);
    expect(out.stderr).toEqual([]);
  });

  it('should format lines with timestamps and level names', () => {
    const out = capture();
    const logger = createLogger({
      timestamps: true,
      now: () => new Date(2024, 0, 5, 9, 3, 7),
      ...out.sinks,
    });

    logger.info('Initializing DuckDB CLI...');
    logger.warn('Falling back.');

    expect(out.stdout).toEqual(['2024-01-05 09:03:07 - INFO - Initializing DuckDB CLI...']);
    expect(out.stderr).toEqual(['2024-01-05 09:03:07 - WARN - Falling back.']);
  });

  it('should print sections and bullet lists', () => {
    const out = capture();
    const logger = createLogger(out.sinks);

    logger.section('AWS profiles');
    logger.list(['default', 'work']);

    expect(out.stdout).toEqual(['\nAWS profiles:', '  - default', '  - work']);
  });
});

describe('formatTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatTimestamp(new Date(2023, 10, 9, 8, 7, 6))).toBe('2023-11-09 08:07:06');
  });
});

describe('isLogLevel', () => {
  it('should accept only known level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
