import type { OperatingSystem } from '../../src/features/operating-systems/schema.js';

export const operatingSystems: readonly OperatingSystem[] = [
  {
    id: '1',
    name: 'Ubuntu',
    version: '20.04',
    kernel: '5.8',
    releaseDate: new Date('2020-04-23T00:00:00.000Z'),
    usages: 500,
    vendor: { name: 'Canonical', country: 'UK' },
  },
  {
    id: '2',
    name: 'CentOS',
    version: '7',
    kernel: '3.10',
    releaseDate: new Date('2014-07-07T00:00:00.000Z'),
    usages: 150,
    vendor: { name: 'Red Hat', country: 'US' },
  },
  {
    id: '3',
    name: 'CentOS',
    version: '8',
    kernel: '4.18',
    releaseDate: new Date('2019-09-24T00:00:00.000Z'),
    usages: 120,
    vendor: { name: 'Red Hat', country: 'US' },
  },
  {
    id: '4',
    name: 'Debian',
    version: '10',
    kernel: '4.19',
    releaseDate: null,
    usages: null,
    vendor: null,
  },
];

/** Ids of the `content` array of a serialised Page. */
export function contentIds(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('content' in body) || !Array.isArray(body.content)) {
    return [];
  }
  return body.content.map((item: unknown) =>
    typeof item === 'object' && item !== null && 'id' in item ? String(item.id) : '',
  );
}
