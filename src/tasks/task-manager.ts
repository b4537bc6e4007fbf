/**
 * TaskManager: runs tasks concurrently, one coordinator loop per task.
 *
 * Each task gets its own AbortController; nothing mutable is shared between
 * tasks except the store, which serializes writes per task on its own.
 */
import type { ConversationRecord, ConversationStore } from '@/conversation/types.js';
import type { ConversationStoreError } from '@/core/errors.js';
import { NotFoundError, TaskStateError, TeamMismatchError, ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { createTask } from '@/core/task.js';
import type { Task, TaskId, TaskOutcome } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { TeamCatalog } from '@/teams/team-catalog.js';
import { snapshotTeam } from '@/teams/team-catalog.js';
import type { ResumeError, TeamCoordinator } from '@/teams/team-coordinator.js';
import type { Team, TeamSnapshot } from '@/teams/types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface TaskManagerOptions {
  coordinator: TeamCoordinator;
  teams: TeamCatalog;
  store: ConversationStore;
  logger?: Logger;
}

export type SubmitError = NotFoundError | ValidationError;

export interface TaskManager {
  /** Create a task and start it in the background. */
  submit(description: string, teamName: string): Result<Task, SubmitError>;
  /** Create a task and wait for it to finish. */
  run(description: string, teamName: string): Promise<Result<TaskOutcome, SubmitError>>;
  /** Abort a task running in this process. It finishes as failed with CANCELLED. */
  cancel(taskId: TaskId): Result<void, NotFoundError>;
  /** Continue a stored, unfinished task in the background with its original team. */
  resume(taskId: TaskId): Promise<Result<Task, ResumeError | TaskStateError>>;
  get(taskId: TaskId): Promise<Result<ConversationRecord, NotFoundError | ConversationStoreError>>;
  list(): Promise<Task[]>;
  /** Outcome of a running or finished task. */
  wait(taskId: TaskId): Promise<Result<TaskOutcome, NotFoundError | ConversationStoreError | TaskStateError>>;
  isActive(taskId: TaskId): boolean;
  /** Cancel every running task and wait for all of them to record their outcome. */
  shutdown(): Promise<void>;
}

interface ActiveTask {
  task: Task;
  snapshot: TeamSnapshot;
  controller: AbortController;
  done: Promise<TaskOutcome>;
}

// ─── Factory ────────────────────────────────────────────────────

export function createTaskManager(options: TaskManagerOptions): TaskManager {
  const { coordinator, teams, store } = options;
  const logger = options.logger ?? createLogger({ name: 'task-manager' });
  const active = new Map<TaskId, ActiveTask>();
  const resuming = new Set<TaskId>();

  function track(task: Task, team: Team, execute: (signal: AbortSignal) => Promise<TaskOutcome>): ActiveTask {
    const controller = new AbortController();
    const done = execute(controller.signal)
      .catch((error: unknown): TaskOutcome => {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Task run crashed', { component: 'task-manager', taskId: task.id, error: message });
        return { taskId: task.id, status: 'failed', summary: '', reason: { code: 'INTERNAL_ERROR', message }, turns: 0 };
      })
      .finally(() => {
        active.delete(task.id);
      });

    const entry: ActiveTask = { task, snapshot: snapshotTeam(team), controller, done };
    active.set(task.id, entry);
    return entry;
  }

  function start(description: string, teamName: string): Result<ActiveTask, SubmitError> {
    if (description.trim() === '') {
      return err(new ValidationError('Task description cannot be empty'));
    }
    const team = teams.get(teamName);
    if (!team.ok) return team;

    const task = createTask(description.trim(), team.value.name);
    logger.info('Task submitted', { component: 'task-manager', taskId: task.id, team: task.teamName });
    return ok(track(task, team.value, (signal) => coordinator.runTask(task, team.value, { signal })));
  }

  return {
    submit(description, teamName) {
      const started = start(description, teamName);
      return started.ok ? ok(started.value.task) : started;
    },

    async run(description, teamName) {
      const started = start(description, teamName);
      if (!started.ok) return started;
      return ok(await started.value.done);
    },

    cancel(taskId) {
      const entry = active.get(taskId);
      if (!entry) return err(new NotFoundError('Running task', taskId));
      if (entry.controller.signal.aborted) return ok(undefined);

      logger.info('Cancelling task', { component: 'task-manager', taskId });
      entry.controller.abort();
      return ok(undefined);
    },

    async resume(taskId) {
      if (active.has(taskId) || resuming.has(taskId)) {
        return err(new TaskStateError(taskId, 'running', 'running'));
      }

      // Claimed before the first await so a concurrent resume sees it
      resuming.add(taskId);
      try {
        const loaded = await store.load(taskId);
        if (!loaded.ok) return loaded;
        const record = loaded.value;
        if (record.outcome) return ok(record.task);

        const team = teams.get(record.team.name);
        if (!team.ok) return team;

        if (snapshotTeam(team.value).fingerprint !== record.team.fingerprint) {
          return err(new TeamMismatchError(taskId, record.team.name, team.value.name));
        }

        logger.info('Resuming task', { component: 'task-manager', taskId, team: record.team.name });
        track(record.task, team.value, async (signal) => {
          const resumed = await coordinator.resumeTask(taskId, team.value, { signal });
          if (!resumed.ok) throw resumed.error;
          return resumed.value;
        });
        return ok({ ...record.task, status: 'running' });
      } finally {
        resuming.delete(taskId);
      }
    },

    async get(taskId) {
      const loaded = await store.load(taskId);
      const entry = active.get(taskId);
      // The header may not be written yet for a task submitted a moment ago
      if (!loaded.ok && loaded.error instanceof NotFoundError && entry) {
        return ok({ task: entry.task, team: entry.snapshot, messages: [] });
      }
      return loaded;
    },

    list() {
      return store.list();
    },

    async wait(taskId) {
      const entry = active.get(taskId);
      if (entry) return ok(await entry.done);

      const loaded = await store.load(taskId);
      if (!loaded.ok) return loaded;
      if (loaded.value.outcome) return ok(loaded.value.outcome);
      return err(new TaskStateError(taskId, loaded.value.task.status, 'completed'));
    },

    isActive(taskId) {
      return active.has(taskId);
    },

    async shutdown() {
      const entries = [...active.values()];
      for (const entry of entries) entry.controller.abort();
      await Promise.all(entries.map((e) => e.done));
      logger.info('Task manager stopped', { component: 'task-manager', cancelled: entries.length });
    },
  };
}
