import type { FastifyInstance } from 'fastify';
import { AppError } from './errors.js';
import type { Logger } from './logger.js';

/** Maps AppError to `{ error, message }` with its status; anything else is a 500. */
export function registerErrorHandler(app: FastifyInstance, log: Logger): void {
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof AppError) {
      log.warn({ code: error.code, message: error.message }, 'App error');
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
      });
    }
    log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
  });
}
