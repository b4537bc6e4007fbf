/**
 * Task routes: submit, inspect, cancel and resume team tasks.
 */
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { exportConversation } from '@/conversation/export.js';
import { asTaskId } from '@/core/task.js';
import type { RouteDependencies } from '../types.js';
import { sendFailure, sendSuccess } from '../error-handler.js';
import { pageTasks, taskListQuerySchema } from '../task-listing.js';

// ─── Schemas ────────────────────────────────────────────────────

const submitTaskSchema = z.object({
  description: z.string().min(1).max(10_000),
  team: z.string().min(1),
});

type TaskParams = { Params: { taskId: string } };

// ─── Routes ─────────────────────────────────────────────────────

/** Register task routes on a Fastify instance. */
export function taskRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { taskManager, logger } = deps;

  // POST /tasks
  fastify.post('/tasks', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = submitTaskSchema.parse(request.body);
    const submitted = taskManager.submit(body.description, body.team);
    if (!submitted.ok) return sendFailure(reply, submitted.error);

    logger.info('Task accepted', { component: 'task-routes', taskId: submitted.value.id, team: body.team });
    await sendSuccess(reply, submitted.value, 202);
  });

  // GET /tasks
  fastify.get('/tasks', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = taskListQuerySchema.parse(request.query);
    await sendSuccess(reply, pageTasks(await taskManager.list(), query));
  });

  // GET /tasks/:taskId: full conversation history export
  fastify.get('/tasks/:taskId', async (request: FastifyRequest<TaskParams>, reply: FastifyReply) => {
    const taskId = asTaskId(request.params.taskId);
    const loaded = await taskManager.get(taskId);
    if (!loaded.ok) return sendFailure(reply, loaded.error);

    await sendSuccess(reply, { ...exportConversation(loaded.value), active: taskManager.isActive(taskId) });
  });

  // POST /tasks/:taskId/cancel
  fastify.post('/tasks/:taskId/cancel', async (request: FastifyRequest<TaskParams>, reply: FastifyReply) => {
    const taskId = asTaskId(request.params.taskId);
    const cancelled = taskManager.cancel(taskId);
    if (!cancelled.ok) return sendFailure(reply, cancelled.error);
    await sendSuccess(reply, { taskId, cancelling: true }, 202);
  });

  // POST /tasks/:taskId/resume
  fastify.post('/tasks/:taskId/resume', async (request: FastifyRequest<TaskParams>, reply: FastifyReply) => {
    const resumed = await taskManager.resume(asTaskId(request.params.taskId));
    if (!resumed.ok) return sendFailure(reply, resumed.error);
    await sendSuccess(reply, resumed.value, resumed.value.status === 'running' ? 202 : 200);
  });
}
