export { SearchSpecification, compileSearch } from './spec/search-specification.js';
export type { CompiledSearch, SearchSpecificationOptions } from './spec/search-specification.js';
export type { Predicate, OrderingFragment } from './spec/predicate.js';
export { paginationOf, DEFAULT_PAGE, DEFAULT_SIZE } from './spec/pagination.js';
export { parseSearchRequest } from './spec/request.js';
export type { SearchRequestBody } from './spec/request.js';
export { resolveFieldPath } from './spec/field-path.js';
export { parseFieldValue } from './spec/field-type.js';
export { defineSchema, field } from './schema/define.js';
export type {
  EntitySchema,
  SchemaFields,
  SchemaField,
  ScalarField,
  NestedField,
  FieldAccessor,
} from './schema/types.js';
export { FIELD_TYPES, OPERATORS, SORT_DIRECTIONS } from './types.js';
export type {
  FieldType,
  Operator,
  SortDirection,
  RawValue,
  TypedValue,
  FilterRequest,
  SortRequest,
  SearchRequest,
  PageParams,
  Page,
  SearchRepository,
  SearchOptions,
} from './types.js';
export { PostgresSearchRepository } from './store/search-repository.js';
export type { SearchRepositoryConfig } from './store/search-repository.js';
export type { SearchLogger } from './logger.js';
export {
  KeyNotFoundError,
  InvalidDataTypeError,
  InvalidRequestError,
  SchemaDefinitionError,
  SearchExecutionError,
} from './errors.js';
