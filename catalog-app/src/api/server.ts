import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import type { SearchRepository } from 'search-spec';
import type { OperatingSystem } from '../features/operating-systems/schema.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerOperatingSystemRoutes } from '../features/operating-systems/routes.js';

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
}

export function buildServer(repository: SearchRepository<OperatingSystem>, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerOperatingSystemRoutes(instance, repository);
  }, { prefix });

  return app;
}
