import pg from 'pg';
import { SearchExecutionError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { SearchLogger } from '../logger.js';
import type { EntitySchema } from '../schema/types.js';
import { compileSearch } from '../spec/search-specification.js';
import { compileCountQuery, compileSearchQuery } from '../sql/compiler.js';
import type { Page, SearchOptions, SearchRepository, SearchRequest } from '../types.js';

export interface SearchRepositoryConfig<T> {
  pool: pg.Pool;
  schema: EntitySchema;
  /** Maps one row as pg returns it to the entity. */
  mapRow: (row: Record<string, unknown>) => T;
  logger?: SearchLogger;
}

export class PostgresSearchRepository<T> implements SearchRepository<T> {
  private readonly pool: pg.Pool;
  private readonly logger: SearchLogger;

  constructor(private readonly config: SearchRepositoryConfig<T>) {
    this.pool = config.pool;
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Compiles first: a KeyNotFoundError or InvalidDataTypeError is thrown before
   * any statement reaches the database. The count and the page are read in one
   * REPEATABLE READ snapshot so that they agree. Database failures are wrapped
   * in SearchExecutionError.
   */
  async search(request: SearchRequest, options: SearchOptions = {}): Promise<Page<T>> {
    const logger = options.logger ?? this.logger;
    const compiled = compileSearch(this.config.schema, request, { logger });
    const count = compileCountQuery(this.config.schema, compiled.predicate);
    const select = compileSearchQuery(this.config.schema, compiled);

    let countResult: pg.QueryResult<{ total: string | number }>;
    let rowsResult: pg.QueryResult<Record<string, unknown>>;
    let client: pg.PoolClient | undefined;
    try {
      client = await this.pool.connect();
      await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
      countResult = await client.query<{ total: string | number }>(count.sql, count.params);
      rowsResult = await client.query<Record<string, unknown>>(select.sql, select.params);
      await client.query('COMMIT');
    } catch (err) {
      await client?.query('ROLLBACK').catch((rollbackErr: unknown) => {
        logger.warn({ err: rollbackErr }, 'Rollback failed');
      });
      throw new SearchExecutionError(`Failed to search ${this.config.schema.table}: ${String(err)}`, err);
    } finally {
      client?.release();
    }

    // pg returns COUNT(*) (a bigint) as a string by default
    const totalElements = Number(countResult.rows[0]?.total ?? 0);
    const { page, size } = compiled.pagination;
    logger.debug({ table: this.config.schema.table, page, size, totalElements }, 'Search executed');

    return {
      content: rowsResult.rows.map(this.config.mapRow),
      page,
      size,
      totalElements,
      totalPages: Math.ceil(totalElements / size),
    };
  }
}
