// REST endpoints (Fastify)
export type { ApiError, ApiResponse, RouteDependencies } from './types.js';

export { registerErrorHandler, sendSuccess, sendError, sendFailure, sendNotFound, toApiFailure } from './error-handler.js';
export type { ApiFailure } from './error-handler.js';
export { registerRoutes, healthRoutes } from './routes/index.js';
export { createServer } from './server.js';
export type { ServerOptions } from './server.js';
export { pageTasks, taskListQuerySchema } from './task-listing.js';
export type { TaskListQuery, TaskPage } from './task-listing.js';
