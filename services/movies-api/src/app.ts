/**
 * Fastify server assembly: CORS, request logging, error envelopes,
 * health probes and the /api/movies routes.
 */

import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import {
  ErrorCode,
  InternalError,
  createErrorResponse,
  createSuccessResponse,
  isAppError,
} from '@mflix/domain';
import { MovieService } from './service.js';
import { movieRoutes } from './routes.js';
import { formatZodError } from './schemas.js';

export interface ServerOptions {
  /** pino level, or false to disable logging */
  logLevel: string | false;
  corsOrigins: string[];
}

/** Probes are polled constantly and stay out of the request log */
const UNLOGGED_PATHS = new Set(['/health']);

function readStatusCode(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function handleError(error: Error, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (isAppError(error)) {
    if (error.statusCode >= 500) {
      request.log.error({ err: error }, error.message);
    }
    return reply
      .code(error.statusCode)
      .send(createErrorResponse(error.message, error.code, error.details));
  }

  if (error instanceof ZodError) {
    return reply
      .code(400)
      .send(createErrorResponse(formatZodError(error), ErrorCode.VALIDATION_ERROR, error.issues));
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return reply.code(statusCode).send(createErrorResponse(error.message, ErrorCode.VALIDATION_ERROR));
  }

  request.log.error({ err: error }, 'Unhandled error');
  const internal = new InternalError(error.message || 'An unknown error occurred.');
  return reply
    .code(internal.statusCode)
    .send(createErrorResponse(internal.message, internal.code));
}

function logResponse(request: FastifyRequest, reply: FastifyReply): void {
  const path = request.url.split('?')[0];
  if (UNLOGGED_PATHS.has(path)) {
    return;
  }

  const line = `${request.method} ${path} ${reply.statusCode} - ${Math.round(reply.elapsedTime)}ms`;
  if (reply.statusCode >= 500) {
    request.log.error(line);
  } else if (reply.statusCode >= 400) {
    request.log.warn(line);
  } else {
    request.log.info(line);
  }
}

export async function buildServer(
  service: MovieService,
  options: ServerOptions
): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logLevel === false ? false : { level: options.logLevel },
    disableRequestLogging: true,
  });

  await server.register(cors, {
    origin: options.corsOrigins,
    credentials: true,
  });

  server.addHook('onResponse', async (request, reply) => {
    logResponse(request, reply);
  });

  server.setErrorHandler(handleError);

  server.setNotFoundHandler((request, reply) => {
    reply
      .code(404)
      .send(createErrorResponse(`Route ${request.method} ${request.url} not found`, ErrorCode.NOT_FOUND));
  });

  // Health check
  server.get('/health', async (_request, reply) => {
    const healthy = await service.healthCheck();
    if (!healthy) {
      reply.code(503);
      return createErrorResponse('Service unhealthy: database unreachable', ErrorCode.DATABASE_ERROR);
    }
    return createSuccessResponse({ status: 'healthy' }, 'Service healthy');
  });

  // Ready check
  server.get('/ready', async () => {
    return createSuccessResponse({ status: 'ready' }, 'Service ready');
  });

  await server.register(movieRoutes, { prefix: '/api/movies', service });

  return server;
}
