import { FastifyError, FastifyInstance } from 'fastify';

import { DomainError, TooManyRequestsError } from '../domain/errors';
import { logger } from '../observability/logger';

export interface ErrorBody {
  error: { code: string; message: string };
}

function body(code: string, message: string): ErrorBody {
  return { error: { code, message } };
}

/** Map domain failures to their status and a uniform `{ error }` body */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof DomainError) {
      if (err instanceof TooManyRequestsError) {
        reply.header('Retry-After', String(Math.ceil(err.retryAfterMs / 1000)));
      }
      return reply.status(err.statusCode).send(body(err.code, err.message));
    }

    // Fastify's own 4xx (malformed JSON, wrong content type, body too large)
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      const code = err.statusCode === 400 ? 'validation_error' : 'bad_request';
      return reply.status(err.statusCode).send(body(code, err.message));
    }

    logger.error({ err, requestId: req.id, method: req.method, url: req.url }, 'Unhandled request error');
    return reply.status(500).send(body('internal_error', 'Internal server error'));
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.status(404).send(body('not_found', `Route not found: ${req.method} ${req.url}`));
  });
}
