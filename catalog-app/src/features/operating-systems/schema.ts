import type pg from 'pg';
import { defineSchema, field } from 'search-spec';

export const operatingSystemSchema = defineSchema({
  table: 'operating_system',
  fields: {
    id: field.long(),
    name: field.string(),
    version: field.string(),
    kernel: field.string(),
    releaseDate: field.date('release_date'),
    usages: field.integer(),
    vendor: field.nested({
      name: field.string(),
      country: field.string(),
    }),
  },
});

export const DDL_CREATE_TABLE = `
CREATE TABLE IF NOT EXISTS operating_system (
  id            BIGSERIAL    PRIMARY KEY,
  name          TEXT         NOT NULL,
  version       TEXT         NOT NULL,
  kernel        TEXT         NOT NULL,
  release_date  TIMESTAMP,
  usages        INTEGER,
  vendor        JSONB
)
`.trim();

export const DDL_CREATE_NAME_INDEX = `
CREATE INDEX IF NOT EXISTS idx_operating_system_name
  ON operating_system (name)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_TABLE);
  await client.query(DDL_CREATE_NAME_INDEX);
}

export interface Vendor {
  name: string | null;
  country: string | null;
}

export interface OperatingSystem {
  id: string; // BIGSERIAL comes back from pg as a string
  name: string;
  version: string;
  kernel: string;
  releaseDate: Date | null;
  usages: number | null;
  vendor: Vendor | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return null;
}

function requiredText(row: Record<string, unknown>, column: string): string {
  const text = optionalText(row[column]);
  if (text === null) throw new TypeError(`operating_system.${column} must not be null`);
  return text;
}

function optionalDate(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string') return new Date(value);
  return null;
}

export function mapOperatingSystemRow(row: Record<string, unknown>): OperatingSystem {
  const usages = row['usages'];
  const vendor = row['vendor']; // pg auto-parses JSONB
  return {
    id: requiredText(row, 'id'),
    name: requiredText(row, 'name'),
    version: requiredText(row, 'version'),
    kernel: requiredText(row, 'kernel'),
    releaseDate: optionalDate(row['release_date']),
    usages: typeof usages === 'number' ? usages : null,
    vendor: isRecord(vendor)
      ? { name: optionalText(vendor['name']), country: optionalText(vendor['country']) }
      : null,
  };
}
