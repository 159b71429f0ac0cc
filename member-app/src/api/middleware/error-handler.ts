import type { FastifyInstance } from 'fastify';
import { CompositionError, NonUniqueResultError } from '../../../../src/index.js';
import { MemberNotFoundError } from '../../domain/errors.js';

function statusCodeOf(error: Error): number | null {
  return 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof MemberNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    // Criteria the query DSL refused to compose → 400
    if (error instanceof CompositionError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    if (error instanceof NonUniqueResultError) {
      return reply.status(409).send({ error: error.name, message: error.message });
    }

    // Fastify built-in errors (schema validation, 404 routing) carry their own status
    const statusCode = statusCodeOf(error);
    if (statusCode !== null && statusCode < 500) {
      return reply.status(statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
