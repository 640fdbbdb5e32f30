import type { FieldType } from '../types.js';

/** A leaf field. `column` defaults to the field name. */
export interface ScalarField {
  readonly kind: 'scalar';
  readonly type: FieldType;
  readonly column?: string;
}

/**
 * A field holding a nested document. Stored as one JSONB column at the root;
 * below the root, children are addressed by property name inside the document.
 */
export interface NestedField {
  readonly kind: 'nested';
  readonly fields: SchemaFields;
  readonly column?: string;
}

export type SchemaField = ScalarField | NestedField;

export type SchemaFields = { readonly [name: string]: SchemaField };

export interface EntitySchema {
  readonly table: string;
  readonly fields: SchemaFields;
}

/**
 * Resolved reference to a (possibly nested) scalar field.
 * Built exclusively by resolveFieldPath().
 */
export interface FieldAccessor {
  /** The dotted key as requested. */
  readonly key: string;
  /** Property names walked from the root, e.g. ['vendor', 'name']. */
  readonly path: readonly string[];
  /** Storage column of the first segment. */
  readonly column: string;
  readonly field: ScalarField;
}
