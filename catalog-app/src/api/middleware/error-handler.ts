import type { FastifyInstance } from 'fastify';
import {
  InvalidDataTypeError,
  InvalidRequestError,
  KeyNotFoundError,
  SearchExecutionError,
} from 'search-spec';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Client mistakes in the search request → 400
    if (
      error instanceof KeyNotFoundError ||
      error instanceof InvalidDataTypeError ||
      error instanceof InvalidRequestError
    ) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    // Database failures → 500 without the driver's message
    if (error instanceof SearchExecutionError) {
      request.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors carry a numeric `statusCode`; pass it through
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
