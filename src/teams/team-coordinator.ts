/**
 * TeamCoordinator: runs the turn-taking loop for a task.
 *
 * One agent step or one tool call is in flight at a time, and every message
 * is stored before the loop moves on, so all agents see the same history in
 * the same order. The stored record is the only state: resuming a task
 * rebuilds everything (speaker, turn count, pending lead choice) from it.
 */
import { stripCompletionToken } from '@/agents/agent-runtime.js';
import type { AgentRuntime, AgentStepError } from '@/agents/agent-runtime.js';
import { renderToolResult } from '@/agents/history-view.js';
import type { AgentDefinition, TeammateInfo } from '@/agents/types.js';
import { pendingToolCalls, turnsTaken } from '@/conversation/conversation-record.js';
import type { ConversationEntry, ConversationRecord, ConversationStore } from '@/conversation/types.js';
import type { ConversationStoreError, NotFoundError } from '@/core/errors.js';
import {
  TaskCancelledError,
  TeamMismatchError,
  ToolNotPermittedError,
  TurnLimitExceededError,
} from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { sleep } from '@/core/sleep.js';
import { createToolCallId } from '@/core/task.js';
import type {
  ConversationMessage,
  DraftMessage,
  Task,
  TaskFailureCode,
  TaskId,
  TaskOutcome,
  ToolCall,
  ToolResult,
} from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolGateway } from '@/tools/gateway/tool-gateway.js';
import { decideNextSpeaker, roundRobinSuccessor } from './routing.js';
import { snapshotTeam } from './team-catalog.js';
import type { Team, TeamSnapshot } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface RuntimeRequest {
  agent: AgentDefinition;
  teammates: readonly TeammateInfo[];
  guidance: readonly string[];
}

/** Builds the runtime for one team member. Called once per member per run. */
export type RuntimeFactory = (request: RuntimeRequest) => AgentRuntime;

export interface TeamCoordinatorOptions {
  store: ConversationStore;
  gateway: ToolGateway;
  createRuntime: RuntimeFactory;
  /** Must match the token the runtimes were told about. Default TASK_COMPLETE. */
  completionToken?: string;
  /** Retries of an agent step after BACKEND_UNAVAILABLE. Default 2. */
  maxStepRetries?: number;
  /** Base backoff between step retries, doubled each retry. Default 1s. */
  stepRetryDelayMs?: number;
  logger?: Logger;
}

export interface RunTaskOptions {
  /** Aborting fails the task with CANCELLED and aborts any in-flight tool call. */
  signal?: AbortSignal;
}

export type ResumeError = NotFoundError | TeamMismatchError | ConversationStoreError;

export interface TeamCoordinator {
  /** Record a new pending task and run it to a terminal status. Never rejects. */
  runTask(task: Task, team: Team, options?: RunTaskOptions): Promise<TaskOutcome>;

  /**
   * Continue a stored task. A task that already finished resolves with its
   * recorded outcome.
   */
  resumeTask(taskId: TaskId, team: Team, options?: RunTaskOptions): Promise<Result<TaskOutcome, ResumeError>>;
}

interface TaskRun {
  taskId: TaskId;
  team: Team;
  snapshot: TeamSnapshot;
  record: ConversationRecord;
  runtimes: ReadonlyMap<string, AgentRuntime>;
  teammates: readonly TeammateInfo[];
  signal: AbortSignal | undefined;
  logContext: { component: string; taskId: TaskId; team: string };
}

// ─── Helpers ────────────────────────────────────────────────────

/** Extra system prompt lines for every member of `team`. */
export function guidanceFor(team: Team): string[] {
  switch (team.routing.type) {
    case 'handoff':
      return ['To pass the turn to a teammate, write "HANDOFF: <name>" in your message.'];
    case 'coordinator-directed':
      return [`${team.routing.lead} leads the team and decides who speaks next.`];
    case 'round-robin':
      return [];
  }
}

function lastAgentText(messages: readonly ConversationMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.kind === 'chat') return message.content;
  }
  return '';
}

function errorResult(call: ToolCall, code: 'TOOL_NOT_PERMITTED' | 'TOOL_INTERRUPTED', message: string): ToolResult {
  return {
    callId: call.id,
    status: 'error',
    error: { code, message, retryable: code === 'TOOL_INTERRUPTED' },
    attempts: 0,
    durationMs: 0,
    completedAt: new Date(),
  };
}

// ─── Coordinator ────────────────────────────────────────────────

export function createTeamCoordinator(options: TeamCoordinatorOptions): TeamCoordinator {
  const { store, gateway, createRuntime } = options;
  const completionToken = options.completionToken ?? 'TASK_COMPLETE';
  const maxStepRetries = options.maxStepRetries ?? 2;
  const stepRetryDelayMs = options.stepRetryDelayMs ?? 1_000;
  const logger = options.logger ?? createLogger({ name: 'team-coordinator' });

  function startRun(record: ConversationRecord, team: Team, snapshot: TeamSnapshot, signal?: AbortSignal): TaskRun {
    const teammates = team.agents.map((a) => ({ name: a.name, description: a.description }));
    const guidance = guidanceFor(team);
    const runtimes = new Map(
      team.agents.map((agent) => [agent.name, createRuntime({ agent, teammates, guidance })]),
    );
    return {
      taskId: record.task.id,
      team,
      snapshot,
      record,
      runtimes,
      teammates,
      signal,
      logContext: { component: 'team-coordinator', taskId: record.task.id, team: team.name },
    };
  }

  // ─── Writes ─────────────────────────────────────────────────────

  async function write(run: TaskRun, entry: ConversationEntry): Promise<Result<ConversationRecord, ConversationStoreError>> {
    const written = await store.append(run.taskId, entry);
    if (written.ok) run.record = written.value;
    return written;
  }

  function appendMessage(run: TaskRun, draft: DraftMessage): Promise<Result<ConversationRecord, ConversationStoreError>> {
    const message: ConversationMessage = {
      ...draft,
      taskId: run.taskId,
      seq: run.record.messages.length + 1,
      timestamp: new Date(),
    };
    return write(run, { type: 'message', message });
  }

  async function finish(
    run: TaskRun,
    status: 'completed' | 'failed',
    summary: string,
    reason?: { code: TaskFailureCode; message: string },
  ): Promise<TaskOutcome> {
    const turns = turnsTaken(run.record.messages);
    const written = await write(run, {
      type: 'status',
      status,
      at: new Date(),
      summary,
      turns,
      ...(reason ? { reason } : {}),
    });

    if (!written.ok) {
      logger.error('Could not record task outcome', { ...run.logContext, error: written.error.message });
    }
    const outcome = written.ok && written.value.outcome
      ? written.value.outcome
      : { taskId: run.taskId, status, summary, reason, turns };

    logger.info('Task finished', { ...run.logContext, status, turns, reason: reason?.code });
    return outcome;
  }

  function fail(run: TaskRun, code: TaskFailureCode, message: string): Promise<TaskOutcome> {
    return finish(run, 'failed', lastAgentText(run.record.messages), { code, message });
  }

  function storeFailure(run: TaskRun, error: ConversationStoreError): Promise<TaskOutcome> {
    logger.error('Conversation store rejected a write', { ...run.logContext, error: error.message });
    return fail(run, 'INTERNAL_ERROR', error.message);
  }

  function stepFailure(run: TaskRun, error: AgentStepError): Promise<TaskOutcome> {
    if (error instanceof TaskCancelledError) return fail(run, 'CANCELLED', error.message);
    return fail(run, 'BACKEND_UNAVAILABLE', error.message);
  }

  // ─── Steps ──────────────────────────────────────────────────────

  async function withStepRetries<T>(
    run: TaskRun,
    agentName: string,
    attempt: () => Promise<Result<T, AgentStepError>>,
  ): Promise<Result<T, AgentStepError>> {
    for (let retries = 0; ; retries++) {
      const result = await attempt();
      if (result.ok || result.error instanceof TaskCancelledError || retries >= maxStepRetries || run.signal?.aborted) {
        return result;
      }
      const delayMs = stepRetryDelayMs * 2 ** retries;
      logger.warn('Retrying agent step', {
        ...run.logContext,
        agent: agentName,
        retry: retries + 1,
        delayMs,
        error: result.error.message,
      });
      await sleep(delayMs, run.signal);
    }
  }

  function dispatch(run: TaskRun, runtime: AgentRuntime, call: ToolCall): Promise<ToolResult> {
    if (!runtime.agent.allowedTools.includes(call.toolName)) {
      const error = new ToolNotPermittedError(call.toolName, call.requesterAgent);
      logger.warn('Tool request refused', { ...run.logContext, agent: call.requesterAgent, tool: call.toolName });
      return Promise.resolve(errorResult(call, 'TOOL_NOT_PERMITTED', error.message));
    }
    return gateway.invoke(call, { signal: run.signal });
  }

  /** Bring a stored record to the point where the loop can take over. */
  async function prepare(run: TaskRun): Promise<Result<void, ConversationStoreError>> {
    if (run.record.task.status === 'pending') {
      const written = await write(run, { type: 'status', status: 'running', at: new Date() });
      if (!written.ok) return written;
    }

    if (run.record.messages.length === 0) {
      const written = await appendMessage(run, {
        kind: 'task',
        role: 'user',
        sender: 'user',
        content: run.record.task.description,
      });
      if (!written.ok) return written;
    }

    for (const pending of pendingToolCalls(run.record.messages)) {
      const { toolCall } = pending;
      logger.warn('Closing tool call interrupted by a restart', {
        ...run.logContext,
        callId: toolCall.id,
        tool: toolCall.toolName,
      });
      const result = errorResult(
        toolCall,
        'TOOL_INTERRUPTED',
        `The run stopped before tool "${toolCall.toolName}" returned; it may or may not have taken effect`,
      );
      const written = await appendMessage(run, {
        kind: 'tool_result',
        role: 'tool',
        sender: toolCall.toolName,
        content: renderToolResult(result),
        toolResult: result,
      });
      if (!written.ok) return written;
    }

    return ok(undefined);
  }

  // ─── Loop ───────────────────────────────────────────────────────

  async function drive(run: TaskRun): Promise<TaskOutcome> {
    const prepared = await prepare(run);
    if (!prepared.ok) return storeFailure(run, prepared.error);

    for (;;) {
      if (run.signal?.aborted) {
        return fail(run, 'CANCELLED', new TaskCancelledError(run.taskId).message);
      }

      const turns = turnsTaken(run.record.messages);
      if (turns >= run.team.maxTurns) {
        return fail(run, 'TURN_LIMIT_EXCEEDED', new TurnLimitExceededError(run.taskId, run.team.maxTurns).message);
      }

      const stepOptions = { taskId: run.taskId, signal: run.signal };
      const decision = decideNextSpeaker(run.snapshot, run.record.messages);

      if (decision.type === 'ask-lead') {
        const lead = run.runtimes.get(decision.lead);
        if (!lead) return fail(run, 'INTERNAL_ERROR', `Lead "${decision.lead}" is not on team "${run.team.name}"`);

        const selected = await withStepRetries(run, decision.lead, () =>
          lead.selectSpeaker(run.record.messages, run.teammates, stepOptions),
        );
        if (!selected.ok) return stepFailure(run, selected.error);

        const next = selected.value ?? roundRobinSuccessor(run.snapshot.members, decision.after);
        const written = await appendMessage(run, {
          kind: 'speaker_selection',
          role: 'system',
          sender: decision.lead,
          content: `${next} speaks next.`,
          nextSpeaker: next,
        });
        if (!written.ok) return storeFailure(run, written.error);
        continue;
      }

      const runtime = run.runtimes.get(decision.name);
      if (!runtime) return fail(run, 'INTERNAL_ERROR', `"${decision.name}" is not on team "${run.team.name}"`);
      const speaker = runtime.agent.name;
      const turn = turns + 1;

      logger.debug('Agent turn', { ...run.logContext, agent: speaker, turn, reason: decision.reason });
      const stepped = await withStepRetries(run, speaker, () => runtime.step(run.record.messages, stepOptions));
      if (!stepped.ok) return stepFailure(run, stepped.error);
      const output = stepped.value;

      switch (output.kind) {
        case 'message': {
          const written = await appendMessage(run, {
            kind: 'chat',
            role: 'agent',
            sender: speaker,
            content: output.text,
            turn,
            final: output.complete,
          });
          if (!written.ok) return storeFailure(run, written.error);
          if (output.complete) {
            return finish(run, 'completed', stripCompletionToken(output.text, completionToken) || output.text);
          }
          break;
        }

        case 'malformed': {
          const written = await appendMessage(run, {
            kind: 'correction',
            role: 'system',
            sender: 'coordinator',
            content: `Your last reply could not be used. ${output.reason} Try again.`,
            turn,
            audience: speaker,
          });
          if (!written.ok) return storeFailure(run, written.error);
          break;
        }

        case 'tool_request': {
          const call: ToolCall = {
            id: createToolCallId(),
            taskId: run.taskId,
            requesterAgent: speaker,
            toolName: output.toolName,
            arguments: output.arguments,
            issuedAt: new Date(),
          };
          const callWritten = await appendMessage(run, {
            kind: 'tool_call',
            role: 'agent',
            sender: speaker,
            content: output.text || `Calling ${output.toolName}`,
            turn,
            toolCall: call,
          });
          if (!callWritten.ok) return storeFailure(run, callWritten.error);

          const result = await dispatch(run, runtime, call);
          const resultWritten = await appendMessage(run, {
            kind: 'tool_result',
            role: 'tool',
            sender: call.toolName,
            content: renderToolResult(result),
            toolResult: result,
          });
          if (!resultWritten.ok) return storeFailure(run, resultWritten.error);

          if (result.status === 'error' && result.error.code === 'CANCELLED') {
            return fail(run, 'CANCELLED', result.error.message);
          }
          break;
        }
      }
    }
  }

  async function guardedDrive(run: TaskRun): Promise<TaskOutcome> {
    try {
      return await drive(run);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Coordinator loop failed', { ...run.logContext, error: message });
      return fail(run, 'INTERNAL_ERROR', message);
    }
  }

  return {
    async runTask(task, team, runOptions) {
      const snapshot = snapshotTeam(team);
      const header = await store.append(task.id, {
        type: 'task',
        task: { ...task, status: 'pending' },
        team: snapshot,
      });
      if (!header.ok) {
        logger.error('Could not record new task', {
          component: 'team-coordinator',
          taskId: task.id,
          error: header.error.message,
        });
        return {
          taskId: task.id,
          status: 'failed',
          summary: '',
          reason: { code: 'INTERNAL_ERROR', message: header.error.message },
          turns: 0,
        };
      }

      const run = startRun(header.value, team, snapshot, runOptions?.signal);
      logger.info('Task started', { ...run.logContext, members: snapshot.members, routing: snapshot.routing.type });
      return guardedDrive(run);
    },

    async resumeTask(taskId, team, runOptions) {
      const loaded = await store.load(taskId);
      if (!loaded.ok) return loaded;
      const record = loaded.value;
      if (record.outcome) return ok(record.outcome);

      const snapshot = snapshotTeam(team);
      if (snapshot.name !== record.team.name || snapshot.fingerprint !== record.team.fingerprint) {
        return err(new TeamMismatchError(taskId, record.team.name, team.name));
      }

      const run = startRun(record, team, snapshot, runOptions?.signal);
      logger.info('Task resumed', {
        ...run.logContext,
        messages: record.messages.length,
        turns: turnsTaken(record.messages),
      });
      return ok(await guardedDrive(run));
    },
  };
}
