/**
 * Filtering, ordering and paging for `GET /tasks`.
 */
import { z } from 'zod';
import { taskStatusSchema } from '@/conversation/schema.js';
import type { Task, TaskStatus } from '@/core/types.js';

export const taskListQuerySchema = z.object({
  status: taskStatusSchema.optional(),
  team: z.string().min(1).optional(),
  order: z.enum(['newest', 'oldest']).default('newest'),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type TaskListQuery = z.output<typeof taskListQuerySchema>;

export interface TaskPage {
  items: Task[];
  /** Tasks matching the filters, before paging. */
  total: number;
  limit: number;
  offset: number;
  /** Per-status counts for the selected team (all teams when unset), ignoring `status`. */
  counts: Record<TaskStatus, number>;
}

export function pageTasks(tasks: readonly Task[], query: TaskListQuery): TaskPage {
  const { status, team, order, limit, offset } = query;
  const counts: Record<TaskStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };

  const inTeam = team ? tasks.filter((t) => t.teamName === team) : [...tasks];
  for (const task of inTeam) counts[task.status]++;

  const direction = order === 'newest' ? -1 : 1;
  const matching = (status ? inTeam.filter((t) => t.status === status) : inTeam).sort(
    (a, b) => direction * (a.createdAt.getTime() - b.createdAt.getTime()),
  );

  return {
    items: matching.slice(offset, offset + limit),
    total: matching.length,
    limit,
    offset,
    counts,
  };
}
