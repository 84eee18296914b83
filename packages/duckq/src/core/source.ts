import type { SourceDescriptor } from '../types.js';

/** URI scheme DuckDB's aws/httpfs extensions read from */
export const OBJECT_STORAGE_SCHEME = 's3';

// RFC 3986 scheme, then an optional `//authority`, then the path.
// Query and fragment are not part of the key.
const URI_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):(?:\/\/([^/?#]*))?([^?#]*)/;

interface ParsedUri {
  scheme: string;
  authority: string;
  path: string;
}

function parseUri(reference: string): ParsedUri | undefined {
  const match = URI_PATTERN.exec(reference);
  if (!match) {
    return undefined;
  }
  const [, scheme = '', authority = '', path = ''] = match;
  return { scheme: scheme.toLowerCase(), authority, path };
}

/**
 * Decides whether a dataset reference points at object storage or the local
 * filesystem.
 *
 * Anything that does not carry the `s3` scheme is local, including empty
 * strings, plain paths and Windows drive paths (`C:\data.csv` parses with
 * scheme `c`). Whether a local path exists is left to DuckDB.
 *
 * @example
 * ```ts
 * classifySource('s3://bucket/key.csv');
 * // { kind: 'object-storage', reference: 's3://bucket/key.csv', scheme: 's3', bucket: 'bucket', key: 'key.csv' }
 *
 * classifySource('/data/file.csv');
 * // { kind: 'local', reference: '/data/file.csv' }
 * ```
 */
export function classifySource(reference: string): SourceDescriptor {
  const uri = parseUri(reference);

  if (uri?.scheme !== OBJECT_STORAGE_SCHEME) {
    return { kind: 'local', reference };
  }

  return {
    kind: 'object-storage',
    reference,
    scheme: uri.scheme,
    bucket: uri.authority,
    key: uri.path.replace(/^\//, ''),
  };
}
