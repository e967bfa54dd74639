import Fastify, { type FastifyInstance } from 'fastify';
import { getEnvironment } from '../config/environment.js';
import { AppError } from '../utils/errors.js';

export async function createApp(): Promise<FastifyInstance> {
  const env = getEnvironment();

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
    requestIdLogLabel: 'reqId',
    requestIdHeader: 'x-request-id',
  });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const { log } = request;

    if (error instanceof AppError) {
      log.warn({ err: error }, 'Application error');
      return reply.status(error.statusCode).send(error.toJSON());
    }

    log.error({ err: error }, 'Unexpected error');

    return reply.status(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'production' ? 'An unexpected error occurred' : error.message,
      },
    });
  });

  return app;
}
