import { defaultLogger } from '../logger.js';
import type { SearchLogger } from '../logger.js';
import type { EntitySchema } from '../schema/types.js';
import { compileSearch } from '../spec/search-specification.js';
import type { Page, SearchOptions, SearchRepository, SearchRequest } from '../types.js';
import { searchInMemory } from './evaluate.js';

export interface InMemorySearchRepositoryConfig<T> {
  schema: EntitySchema;
  rows: readonly T[];
  logger?: SearchLogger;
}

/**
 * SearchRepository over a fixed collection. Same compile step and errors as
 * the PostgreSQL repository; evaluation happens in process.
 */
export class InMemorySearchRepository<T> implements SearchRepository<T> {
  private readonly logger: SearchLogger;

  constructor(private readonly config: InMemorySearchRepositoryConfig<T>) {
    this.logger = config.logger ?? defaultLogger;
  }

  async search(request: SearchRequest, options: SearchOptions = {}): Promise<Page<T>> {
    const compiled = compileSearch(this.config.schema, request, { logger: options.logger ?? this.logger });
    return searchInMemory(this.config.rows, compiled);
  }
}
