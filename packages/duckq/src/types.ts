/**
 * Shared types for duckq.
 *
 * @module duckq/types
 */

/**
 * Where the dataset lives. Produced only by `classifySource`.
 */
export type SourceDescriptor = LocalSource | ObjectStorageSource;

export interface LocalSource {
  readonly kind: 'local';
  /** The reference exactly as the user typed it */
  readonly reference: string;
}

export interface ObjectStorageSource {
  readonly kind: 'object-storage';
  readonly reference: string;
  /** Always lower-case */
  readonly scheme: string;
  readonly bucket: string;
  /** Object key, without the leading slash */
  readonly key: string;
}

export type FormatKind = 'csv' | 'parquet';

export const FORMAT_KINDS: readonly FormatKind[] = ['csv', 'parquet'];

/**
 * `primary` is the native DuckDB shell; `alternate` is the richer Harlequin UI.
 */
export type FrontEndChoice = 'primary' | 'alternate';

export const FRONT_END_CHOICES: readonly FrontEndChoice[] = ['primary', 'alternate'];

/**
 * Ordered initialization statements handed to the front end.
 */
export type InitScript = readonly string[];

/**
 * How an interactive session ended.
 */
export type ExitOutcome =
  | { readonly kind: 'success' }
  | { readonly kind: 'process-failed'; readonly exitCode: number }
  | { readonly kind: 'executable-not-found'; readonly executable: string }
  | { readonly kind: 'unexpected-error'; readonly detail: string };
