import type { EntitySchema, FieldAccessor } from '../schema/types.js';
import { formatTimestamp } from '../spec/field-type.js';
import type { OrderingFragment, Predicate } from '../spec/predicate.js';
import type { CompiledSearch } from '../spec/search-specification.js';
import type { FieldType, TypedValue } from '../types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

const SQL_TYPES: Record<FieldType, string> = {
  BOOLEAN: 'boolean',
  CHAR: 'text',
  DATE: 'timestamp',
  DOUBLE: 'double precision',
  INTEGER: 'integer',
  LONG: 'bigint',
  STRING: 'text',
};

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function quoteLiteral(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Text form of the field. Nested leaves are read out of the JSONB column with
 * `->` for intermediate segments and `->>` for the last one.
 */
function textRef(field: FieldAccessor): string {
  const column = quoteIdentifier(field.column);
  const inner = field.path.slice(1);
  if (inner.length === 0) {
    return SQL_TYPES[field.field.type] === 'text' ? column : `${column}::text`;
  }
  const steps = inner.map((segment, i) => (i === inner.length - 1 ? '->>' : '->') + quoteLiteral(segment));
  return `(${column}${steps.join('')})`;
}

/** Typed form of the field, for comparisons and ORDER BY. */
function valueRef(field: FieldAccessor): string {
  if (field.path.length === 1) return quoteIdentifier(field.column);
  const type = SQL_TYPES[field.field.type];
  const text = textRef(field);
  return type === 'text' ? text : `${text}::${type}`;
}

/**
 * Appends one parameter and returns its placeholder. DATE and LONG values
 * travel as text with an explicit cast so no timezone or precision is lost.
 */
function bind(value: TypedValue, params: unknown[], counter: { n: number }): string {
  counter.n += 1;
  const ref = `$${counter.n}`;
  if (value instanceof Date) {
    params.push(formatTimestamp(value));
    return `${ref}::timestamp`;
  }
  if (typeof value === 'bigint') {
    params.push(value.toString());
    return `${ref}::bigint`;
  }
  params.push(value);
  return ref;
}

/**
 * Compiles a Predicate into a SQL boolean expression and appends parameters.
 * Uses a shared counter object so recursive calls share the same sequence.
 */
export function compilePredicate(
  predicate: Predicate,
  params: unknown[],
  counter: { n: number } = { n: params.length },
): string {
  switch (predicate.kind) {
    case 'true':
      return 'TRUE';
    case 'and': {
      const parts = predicate.predicates.map((p) => compilePredicate(p, params, counter));
      return `(${parts.join(' AND ')})`;
    }
    case 'eq':
      return `${valueRef(predicate.field)} = ${bind(predicate.value, params, counter)}`;
    case 'ne':
      return `${valueRef(predicate.field)} <> ${bind(predicate.value, params, counter)}`;
    case 'like':
      // No escape character: a backslash in the value is matched literally
      return `UPPER(${textRef(predicate.field)}) LIKE ${bind(predicate.pattern, params, counter)} ESCAPE ''`;
    case 'in': {
      const refs = predicate.values.map((v) => bind(v, params, counter));
      return `${valueRef(predicate.field)} IN (${refs.join(', ')})`;
    }
    case 'between': {
      const from = bind(predicate.from, params, counter);
      const to = bind(predicate.to, params, counter);
      return `${valueRef(predicate.field)} BETWEEN ${from} AND ${to}`;
    }
    default: {
      const unreachable: never = predicate;
      throw new TypeError(`Unknown predicate: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Empty string when there is nothing to order by. */
export function compileOrderBy(orderings: readonly OrderingFragment[]): string {
  if (orderings.length === 0) return '';
  const parts = orderings.map((o) => `${valueRef(o.field)} ${o.direction}`);
  return `ORDER BY ${parts.join(', ')}`;
}

/**
 * Compiles a search into a page-sized SELECT. Orderings keep request order, so
 * the first one is the primary sort key.
 */
export function compileSearchQuery(schema: EntitySchema, compiled: CompiledSearch): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const where = compilePredicate(compiled.predicate, params, counter);
  const orderBy = compileOrderBy(compiled.orderings);

  params.push(compiled.pagination.size);
  counter.n += 1;
  const limitRef = `$${counter.n}`;

  params.push(compiled.pagination.offset);
  counter.n += 1;
  const offsetRef = `$${counter.n}`;

  const sql = [
    `SELECT * FROM ${quoteIdentifier(schema.table)}`,
    `WHERE ${where}`,
    ...(orderBy === '' ? [] : [orderBy]),
    `LIMIT ${limitRef} OFFSET ${offsetRef}`,
  ].join('\n');

  return { sql, params };
}

/** Compiles the total-count query for the same predicate. No ORDER BY. */
export function compileCountQuery(schema: EntitySchema, predicate: Predicate): CompiledQuery {
  const params: unknown[] = [];
  const where = compilePredicate(predicate, params, { n: 0 });

  const sql = [
    `SELECT COUNT(*) AS total FROM ${quoteIdentifier(schema.table)}`,
    `WHERE ${where}`,
  ].join('\n');

  return { sql, params };
}
