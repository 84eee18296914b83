import { extname } from 'node:path';
import type { FormatKind, SourceDescriptor } from '../types.js';
import { UnsupportedFormatError } from '../utils/errors.js';

const EXTENSION_FORMATS: Readonly<Record<string, FormatKind>> = {
  '.csv': 'csv',
  '.parquet': 'parquet',
};

/**
 * DuckDB table function that scans files of the given format.
 */
export function readerFunction(format: FormatKind): string {
  return format === 'csv' ? 'read_csv' : 'read_parquet';
}

const URL_REFERENCE = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/[^?#]*/;

function pathOf(source: SourceDescriptor): string {
  if (source.kind === 'object-storage') {
    return source.key;
  }
  // Query strings and fragments only mean something on URLs, not file paths.
  return URL_REFERENCE.exec(source.reference)?.[0] ?? source.reference;
}

/**
 * Infers the file format from the source's extension, case-insensitively.
 * For object storage only the key counts; other URLs drop their query string
 * and fragment first.
 *
 * @throws UnsupportedFormatError when the extension is neither .csv nor .parquet
 */
export function detectFormat(source: SourceDescriptor): FormatKind {
  const format = EXTENSION_FORMATS[extname(pathOf(source)).toLowerCase()];

  if (format === undefined) {
    throw new UnsupportedFormatError(source.reference);
  }
  return format;
}
