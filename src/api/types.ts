import type { Logger } from '@/observability/logger.js';
import type { TaskManager } from '@/tasks/task-manager.js';
import type { TeamCatalog } from '@/teams/team-catalog.js';
import type { ToolRegistry } from '@/tools/registry/tool-registry.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  taskManager: TaskManager;
  teams: TeamCatalog;
  toolRegistry: ToolRegistry;
  logger: Logger;
}
