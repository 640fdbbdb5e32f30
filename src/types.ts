import type { SearchLogger } from './logger.js';

export const FIELD_TYPES = ['BOOLEAN', 'CHAR', 'DATE', 'DOUBLE', 'INTEGER', 'LONG', 'STRING'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

export const OPERATORS = ['EQUAL', 'NOT_EQUAL', 'LIKE', 'IN', 'BETWEEN'] as const;
export type Operator = (typeof OPERATORS)[number];

export const SORT_DIRECTIONS = ['ASC', 'DESC'] as const;
export type SortDirection = (typeof SORT_DIRECTIONS)[number];

/**
 * A value as it arrives on the wire. Coerced lazily by the declared FieldType.
 */
export type RawValue = string | number | boolean;

/** Result of parsing a RawValue under a FieldType. LONG parses to bigint. */
export type TypedValue = boolean | string | number | bigint | Date | null;

export interface FilterRequest {
  readonly key: string;
  readonly operator: Operator;
  readonly fieldType: FieldType;
  readonly value?: RawValue | null;
  /** BETWEEN only. */
  readonly valueTo?: RawValue | null;
  /** IN only. */
  readonly values?: readonly RawValue[] | null;
}

export interface SortRequest {
  readonly key: string;
  readonly direction: SortDirection;
}

export interface SearchRequest {
  readonly filters?: readonly FilterRequest[] | null;
  readonly sorts?: readonly SortRequest[] | null;
  /** 0-indexed. */
  readonly page?: number | null;
  readonly size?: number | null;
}

export interface PageParams {
  page: number;
  size: number;
  offset: number;
}

export interface Page<T> {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
}

/**
 * Execution collaborator: accepts a search request and returns one page of entities.
 */
export interface SearchRepository<T> {
  search(request: SearchRequest, options?: SearchOptions): Promise<Page<T>>;
}

export interface SearchOptions {
  /** Per-call logger, e.g. a request-scoped child logger. */
  logger?: SearchLogger;
}

