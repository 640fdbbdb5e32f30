import pg from 'pg';
import { PostgresSearchRepository } from 'search-spec';
import type { SearchRepository } from 'search-spec';
import { mapOperatingSystemRow, operatingSystemSchema } from './features/operating-systems/schema.js';
import type { OperatingSystem } from './features/operating-systems/schema.js';

const TIMESTAMP_OID = 1114;

/**
 * Reads TIMESTAMP (without time zone) columns as UTC wall-clock time, the form
 * the search engine parses and binds DATE values in. pg's default would apply
 * the server's local zone.
 */
export function parseTimestampAsUtc(text: string): Date {
  return new Date(`${text.replace(' ', 'T')}Z`);
}

export function createPool(connectionString: string): pg.Pool {
  pg.types.setTypeParser(TIMESTAMP_OID, parseTimestampAsUtc);
  return new pg.Pool({ connectionString });
}

export function createRepository(pool: pg.Pool): SearchRepository<OperatingSystem> {
  return new PostgresSearchRepository({
    pool,
    schema: operatingSystemSchema,
    mapRow: mapOperatingSystemRow,
  });
}
