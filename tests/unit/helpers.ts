import { vi } from 'vitest';
import { defineSchema, field } from '../../src/schema/define.js';
import type { SearchLogger } from '../../src/logger.js';

export const osSchema = defineSchema({
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
      address: field.nested({ city: field.string(), zip: field.integer() }),
    }),
  },
});

export interface OsRow {
  id: number;
  name: string;
  version: string;
  kernel: string;
  releaseDate: Date;
  usages: number;
  vendor: { name: string; country: string; address?: { city: string; zip: number } } | null;
}

export function utc(year: number, month: number, day: number, h = 0, m = 0, s = 0): Date {
  return new Date(Date.UTC(year, month - 1, day, h, m, s));
}

const canonical = { name: 'Canonical', country: 'UK', address: { city: 'London', zip: 10 } };
const redHat = { name: 'Red Hat', country: 'US', address: { city: 'Raleigh', zip: 27601 } };

export const osRows: readonly OsRow[] = [
  { id: 1, name: 'Ubuntu', version: '20.04', kernel: '5.8', releaseDate: utc(2020, 4, 23), usages: 500, vendor: canonical },
  { id: 2, name: 'Ubuntu', version: '21.10', kernel: '5.13', releaseDate: utc(2021, 10, 14), usages: 250, vendor: canonical },
  { id: 3, name: 'Ubuntu', version: '22.04', kernel: '5.15', releaseDate: utc(2022, 4, 21), usages: 300, vendor: canonical },
  { id: 4, name: 'CentOS', version: '7', kernel: '3.10', releaseDate: utc(2014, 7, 7), usages: 150, vendor: redHat },
  { id: 5, name: 'CentOS', version: '8', kernel: '4.18', releaseDate: utc(2019, 9, 24), usages: 120, vendor: redHat },
  { id: 6, name: 'Debian', version: '11', kernel: '5.10', releaseDate: utc(2021, 8, 14), usages: 100, vendor: { name: 'Debian Project', country: 'Global' } },
  { id: 7, name: 'Debian', version: '10', kernel: '4.19', releaseDate: utc(2019, 7, 6), usages: 90, vendor: null },
  { id: 8, name: 'Fedora', version: '35', kernel: '5.14', releaseDate: utc(2021, 11, 2), usages: 80, vendor: redHat },
  { id: 9, name: 'Fedora', version: '33', kernel: '5.8', releaseDate: utc(2020, 10, 27), usages: 60, vendor: redHat },
  { id: 10, name: 'Pop!_OS', version: '21.10', kernel: '5.13', releaseDate: utc(2021, 12, 14), usages: 40, vendor: { name: 'System76', country: 'US' } },
];

export function ids(rows: readonly OsRow[]): number[] {
  return rows.map((r) => r.id);
}

/** A logger whose calls can be asserted on. */
export function makeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies SearchLogger;
}
