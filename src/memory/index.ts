export { matches, compareRows, compareValues, readField, searchInMemory } from './evaluate.js';
export { InMemorySearchRepository } from './repository.js';
export type { InMemorySearchRepositoryConfig } from './repository.js';
