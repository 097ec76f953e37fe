import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env, corsOrigins, type Env } from './config/env.js';
import { registerRoutes } from './api/routes.js';
import { applyZodValidation } from './plugins/zod.js';
import { AppError, RequestValidationError } from './common/errors.js';

export const INTERNAL_ERROR_MESSAGE = 'An internal server error occurred.';

export interface AppLoggerOptions {
  level?: Env['LOG_LEVEL'];
  /** Destination for JSON log lines; stdout when omitted */
  stream?: { write(msg: string): void };
}

export interface BuildAppOptions {
  /** `false` disables logging */
  logger?: false | AppLoggerOptions;
  /** Clock used for default dates; UTC is read from it */
  now?: () => Date;
}

function loggerConfig(options: false | AppLoggerOptions = {}) {
  if (options === false) return false;
  const level = options.level ?? env.LOG_LEVEL;
  return options.stream ? { level, stream: options.stream } : { level };
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: loggerConfig(options.logger),
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: corsOrigins(env.CORS_ORIGINS),
    credentials: true,
  });

  // Zod schemas on routes
  applyZodValidation(app);

  // Global error handler
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof RequestValidationError) {
      request.log.warn({ issues: err.issues }, 'Request validation failed');
      return reply.status(err.statusCode).send({ detail: err.issues });
    }

    if (err instanceof AppError && err.expose) {
      request.log.warn({ err }, err.message);
      return reply.status(err.statusCode).send({ detail: err.message });
    }

    // Fastify's own client errors (malformed request, unsupported media type)
    const statusCode = err.statusCode ?? 500;
    if (!(err instanceof AppError) && statusCode >= 400 && statusCode < 500) {
      request.log.warn({ err }, err.message);
      return reply.status(statusCode).send({ detail: err.message });
    }

    request.log.error({ err }, 'An unexpected error occurred');
    return reply.status(500).send({ detail: INTERNAL_ERROR_MESSAGE });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({ detail: 'Not Found' });
  });

  app.register(registerRoutes, { now: options.now ?? (() => new Date()) });

  return app;
}
