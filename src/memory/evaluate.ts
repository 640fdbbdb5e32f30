import type { FieldAccessor } from '../schema/types.js';
import { formatTimestamp } from '../spec/field-type.js';
import type { OrderingFragment, Predicate } from '../spec/predicate.js';
import type { CompiledSearch } from '../spec/search-specification.js';
import type { Page } from '../types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walks the accessor's property path; undefined when any step is missing. */
export function readField(row: unknown, field: FieldAccessor): unknown {
  let current: unknown = row;
  for (const segment of field.path) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function isNumeric(value: unknown): value is number | bigint {
  return (typeof value === 'number' && !Number.isNaN(value)) || typeof value === 'bigint';
}

/**
 * Three-way comparison of two values of the same kind. Numbers and bigints
 * compare with each other. Returns null for values that have no common
 * ordering, such as a string against a number.
 */
export function compareValues(a: unknown, b: unknown): number | null {
  if (isNumeric(a) && isNumeric(b)) return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime());
  return null;
}

function textOf(value: unknown): string {
  return value instanceof Date ? formatTimestamp(value) : String(value);
}

/**
 * Translates a LIKE pattern: `%` is any run of characters, `_` exactly one.
 * There is no escape character, matching the `ESCAPE ''` the SQL compiler emits.
 */
function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '%') source += '[\\s\\S]*';
    else if (ch === '_') source += '[\\s\\S]';
    else source += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

/**
 * Evaluates a predicate against one row. As in SQL, a null or missing field
 * value satisfies no comparison, not even NOT_EQUAL.
 */
export function matches(predicate: Predicate, row: unknown): boolean {
  if (predicate.kind === 'true') return true;
  if (predicate.kind === 'and') return predicate.predicates.every((p) => matches(p, row));

  const value = readField(row, predicate.field);
  if (value === null || value === undefined) return false;

  switch (predicate.kind) {
    case 'eq':
      return compareValues(value, predicate.value) === 0;
    case 'ne': {
      const cmp = compareValues(value, predicate.value);
      return cmp !== null && cmp !== 0;
    }
    case 'like':
      return likeToRegExp(predicate.pattern).test(textOf(value).toUpperCase());
    case 'in':
      return predicate.values.some((v) => compareValues(value, v) === 0);
    case 'between': {
      const lower = compareValues(value, predicate.from);
      const upper = compareValues(value, predicate.to);
      return lower !== null && upper !== null && lower >= 0 && upper <= 0;
    }
    default: {
      const unreachable: never = predicate;
      throw new TypeError(`Unknown predicate: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Comparator for Array.prototype.sort over the orderings in priority order.
 * Nulls sort last ascending and first descending, as PostgreSQL does.
 */
export function compareRows(orderings: readonly OrderingFragment[]): (a: unknown, b: unknown) => number {
  return (a, b) => {
    for (const { field, direction } of orderings) {
      const va = readField(a, field);
      const vb = readField(b, field);
      const aNull = va === null || va === undefined;
      const bNull = vb === null || vb === undefined;
      if (aNull && bNull) continue;

      let cmp: number;
      if (aNull) cmp = 1;
      else if (bNull) cmp = -1;
      else cmp = compareValues(va, vb) ?? compareValues(textOf(va), textOf(vb)) ?? 0;

      if (cmp !== 0) return direction === 'DESC' ? -cmp : cmp;
    }
    return 0;
  };
}

/**
 * Runs a compiled search over an in-memory collection: filter, stable sort,
 * then slice out the requested page. The input array is not modified.
 */
export function searchInMemory<T>(rows: readonly T[], compiled: CompiledSearch): Page<T> {
  const { page, size, offset } = compiled.pagination;
  const selected = rows.filter((row) => matches(compiled.predicate, row));
  selected.sort(compareRows(compiled.orderings));

  return {
    content: selected.slice(offset, offset + size),
    page,
    size,
    totalElements: selected.length,
    totalPages: Math.ceil(selected.length / size),
  };
}
