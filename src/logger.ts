import { pino } from 'pino';
import type { BaseLogger } from 'pino';

/**
 * Minimal logger surface the engine writes to. Any pino logger satisfies it,
 * including Fastify's `request.log`.
 */
export type SearchLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export const defaultLogger: SearchLogger = pino({
  name: 'search-spec',
  level: process.env['LOG_LEVEL'] ?? 'info',
});
