/**
 * Route registration: registers all API routes on a Fastify instance.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { taskRoutes } from './tasks.js';
import { teamRoutes } from './teams.js';
import { toolRoutes } from './tools.js';

/** Register all API routes on the Fastify instance. */
export function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  taskRoutes(fastify, deps);
  teamRoutes(fastify, deps);
  toolRoutes(fastify, deps);
}

export { healthRoutes } from './health.js';
