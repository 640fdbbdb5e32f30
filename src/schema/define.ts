import { SchemaDefinitionError } from '../errors.js';
import type { FieldType } from '../types.js';
import type { EntitySchema, NestedField, ScalarField, SchemaFields } from './types.js';

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function scalar(type: FieldType, column?: string): ScalarField {
  return column === undefined ? { kind: 'scalar', type } : { kind: 'scalar', type, column };
}

/**
 * Field builders for defineSchema().
 *
 * @example
 * defineSchema({
 *   table: 'operating_system',
 *   fields: {
 *     name: field.string(),
 *     releaseDate: field.date('release_date'),
 *     vendor: field.nested({ name: field.string() }),
 *   },
 * })
 */
export const field = {
  boolean: (column?: string): ScalarField => scalar('BOOLEAN', column),
  char: (column?: string): ScalarField => scalar('CHAR', column),
  date: (column?: string): ScalarField => scalar('DATE', column),
  double: (column?: string): ScalarField => scalar('DOUBLE', column),
  integer: (column?: string): ScalarField => scalar('INTEGER', column),
  long: (column?: string): ScalarField => scalar('LONG', column),
  string: (column?: string): ScalarField => scalar('STRING', column),
  nested(fields: SchemaFields, column?: string): NestedField {
    return column === undefined ? { kind: 'nested', fields } : { kind: 'nested', fields, column };
  },
};

function validateFields(fields: SchemaFields, trail: string): void {
  const names = Object.keys(fields);
  if (names.length === 0) {
    const label = trail === '' ? 'schema' : `"${trail}"`;
    throw new SchemaDefinitionError(`defineSchema: ${label} must declare at least one field`);
  }
  for (const name of names) {
    const path = trail === '' ? name : `${trail}.${name}`;
    if (!IDENTIFIER_PATTERN.test(name)) {
      throw new SchemaDefinitionError(`defineSchema: field name "${path}" must match ${String(IDENTIFIER_PATTERN)}`);
    }
    const def = fields[name];
    if (def === undefined) continue;
    if (def.column !== undefined && !IDENTIFIER_PATTERN.test(def.column)) {
      throw new SchemaDefinitionError(`defineSchema: column "${def.column}" of "${path}" must match ${String(IDENTIFIER_PATTERN)}`);
    }
    if (def.kind === 'nested') validateFields(def.fields, path);
  }
}

/**
 * Validates an EntitySchema and returns it typed.
 * Throws SchemaDefinitionError if the table or any field/column name is not a
 * plain identifier, or if the schema or a nested field declares no fields.
 */
export function defineSchema<S extends EntitySchema>(schema: S): S {
  if (!IDENTIFIER_PATTERN.test(schema.table)) {
    throw new SchemaDefinitionError(`defineSchema: table "${schema.table}" must match ${String(IDENTIFIER_PATTERN)}`);
  }
  validateFields(schema.fields, '');
  return schema;
}
