/**
 * Error types and coercion helpers shared across the CLI.
 */

/**
 * Base class for errors raised by duckq itself.
 *
 * Carries a machine-readable {@link code} so callers can branch without
 * matching on message text.
 *
 * Codes:
 * - `UNSUPPORTED_FORMAT` - file format could not be inferred from the reference
 * - `INVALID_CONFIG` - an environment setting holds an unusable value
 */
export class DuckqError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'DuckqError';
    this.code = code;
  }
}

/**
 * Raised by `--type auto` when the reference has no recognised extension.
 */
export class UnsupportedFormatError extends DuckqError {
  readonly reference: string;

  constructor(reference: string) {
    super(
      `Cannot infer file type from ${reference}.\n\n` +
        `Supported extensions are .csv and .parquet. For other files, pass the type explicitly:\n` +
        `  duckq ${reference} --type csv\n` +
        `  duckq ${reference} --type parquet`,
      'UNSUPPORTED_FORMAT'
    );
    this.name = 'UnsupportedFormatError';
    this.reference = reference;
  }
}

export class ConfigError extends DuckqError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`, 'INVALID_CONFIG');
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

/**
 * Coerces an unknown value to an Error instance.
 * If the value is already an Error, returns it as-is.
 * Otherwise, converts it to a string and wraps it in a new Error.
 *
 * @example
 * ```ts
 * try {
 *   launch();
 * } catch (error) {
 *   logger.error(toError(error).message);
 * }
 * ```
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extracts the error message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/**
 * Full description of an error for debug output: the stack when there is
 * one, the message otherwise.
 */
export function describeError(error: unknown): string {
  const err = toError(error);
  return err.stack ?? err.message;
}

/**
 * Reads the `code` property Node attaches to system errors (`ENOENT`, `EACCES`, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
