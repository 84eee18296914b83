import { describe, it, expect } from 'vitest';
import { detectFormat, readerFunction } from '../core/format.js';
import { classifySource } from '../core/source.js';
import { UnsupportedFormatError } from '../utils/errors.js';

describe('readerFunction', () => {
  it('should map formats to DuckDB table functions', () => {
    expect(readerFunction('csv')).toBe('read_csv');
    expect(readerFunction('parquet')).toBe('read_parquet');
  });
});

describe('detectFormat', () => {
  it('should detect csv and parquet from local paths', () => {
    expect(detectFormat(classifySource('/data/trips.csv'))).toBe('csv');
    expect(detectFormat(classifySource('trips.parquet'))).toBe('parquet');
  });

  it('should ignore extension case', () => {
    expect(detectFormat(classifySource('/data/TRIPS.PARQUET'))).toBe('parquet');
  });

  it('should use the object key for s3 URIs', () => {
    expect(detectFormat(classifySource('s3://bucket/trips.parquet?versionId=3'))).toBe('parquet');
  });

  it('should ignore the query string and fragment of other URLs', () => {
    expect(detectFormat(classifySource('https://example.com/data.csv?sig=1'))).toBe('csv');
    expect(detectFormat(classifySource('gs://bucket/trips.parquet#part'))).toBe('parquet');
  });

  it('should reject unknown extensions', () => {
    expect(() => detectFormat(classifySource('/data/trips.json'))).toThrow(UnsupportedFormatError);
  });

  it('should reject references without an extension', () => {
    try {
      detectFormat(classifySource('s3://bucket/trips'));
      expect.fail('expected detectFormat to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedFormatError);
      if (error instanceof UnsupportedFormatError) {
        expect(error.code).toBe('UNSUPPORTED_FORMAT');
        expect(error.reference).toBe('s3://bucket/trips');
        expect(error.message).toContain('--type parquet');
      }
    }
  });
});
