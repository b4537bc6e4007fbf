/**
 * HTTP server assembly: security plugins, error handler, health check and
 * the versioned API routes.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { registerErrorHandler } from './error-handler.js';
import { healthRoutes, registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export interface ServerOptions {
  /** Comma-separated allowed origins; every origin when unset. */
  corsOrigin?: string;
  /** Requests per minute per client. Default 100. */
  rateLimitMax?: number;
}

export async function createServer(deps: RouteDependencies, options?: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });

  await server.register(cors, {
    origin: options?.corsOrigin ? options.corsOrigin.split(',') : true,
  });
  await server.register(helmet);
  await server.register(rateLimit, { max: options?.rateLimitMax ?? 100, timeWindow: '1 minute' });

  registerErrorHandler(server, deps.logger);
  healthRoutes(server, deps);

  // API routes under /api/v1
  await server.register(
    (prefixed, _opts, done) => {
      registerRoutes(prefixed, deps);
      done();
    },
    { prefix: '/api/v1' },
  );

  return server;
}
