import type { FastifyInstance } from 'fastify';
import { parseSearchRequest } from 'search-spec';
import type { SearchRepository } from 'search-spec';
import type { OperatingSystem } from './schema.js';

export async function registerOperatingSystemRoutes(
  app: FastifyInstance,
  repository: SearchRepository<OperatingSystem>,
): Promise<void> {
  // POST /operating-system/search: one page of matching operating systems
  app.post('/operating-system/search', async (request, reply) => {
    const searchRequest = parseSearchRequest(request.body);
    const page = await repository.search(searchRequest, { logger: request.log });
    return reply.status(200).send(page);
  });
}
