import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { createTeamCoordinator, guidanceFor } from './team-coordinator.js';
import { snapshotTeam } from './team-catalog.js';
import type { Team } from './types.js';
import { createAgentRuntime } from '@/agents/agent-runtime.js';
import type { AgentDefinition } from '@/agents/types.js';
import { createMemoryConversationStore } from '@/conversation/memory-store.js';
import type { ConversationEntry, ConversationRecord, ConversationStore } from '@/conversation/types.js';
import { ConversationStoreError } from '@/core/errors.js';
import { err, unwrap } from '@/core/result.js';
import { createTask } from '@/core/task.js';
import type { ConversationMessage, TaskId } from '@/core/types.js';
import { createToolGateway } from '@/tools/gateway/tool-gateway.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';
import { createScriptedTool } from '@/testing/fixtures/tools.js';
import type { ScriptedTool } from '@/testing/fixtures/tools.js';
import { createMessageFactory, createTestTask } from '@/testing/fixtures/conversation.js';
import { createMockLogger } from '@/testing/helpers/mock-logger.js';
import { createScriptedProvider } from '@/testing/helpers/scripted-provider.js';
import type { ScriptedProvider } from '@/testing/helpers/scripted-provider.js';

// ─── Fixtures ───────────────────────────────────────────────────

const llm = { provider: 'groq', model: 'llama3-8b-8192' } as const;

const writer: AgentDefinition = {
  name: 'Writer',
  instructions: 'Write files when asked.',
  allowedTools: ['write_file'],
  llm,
};

const reviewer: AgentDefinition = {
  name: 'Reviewer',
  description: 'checks the work',
  instructions: 'Review what the writer produced.',
  allowedTools: [],
  llm,
};

function makeTeam(overrides?: Partial<Team>): Team {
  return {
    name: 'writers',
    agents: [writer, reviewer],
    routing: { type: 'round-robin' },
    maxTurns: 10,
    afterToolResult: 'same-speaker',
    ...overrides,
  };
}

function writeFileTool(steps: Parameters<typeof createScriptedTool>[1] = [{ ok: { bytesWritten: 2 } }]) {
  return createScriptedTool('write_file', steps, {
    inputSchema: z.object({ path: z.string(), content: z.string() }),
  });
}

interface SetupOptions {
  tools?: ScriptedTool[];
  store?: ConversationStore;
  gatewayTimeoutMs?: number;
}

function setup(providers: Record<string, ScriptedProvider>, options?: SetupOptions) {
  const logger = createMockLogger();
  const store = options?.store ?? createMemoryConversationStore();
  const registry = createToolRegistry(options?.tools ?? [writeFileTool()]);
  const gateway = createToolGateway({
    registry,
    timeoutMs: options?.gatewayTimeoutMs ?? 1_000,
    maxRetries: 2,
    retryDelayMs: 0,
    logger,
  });
  const coordinator = createTeamCoordinator({
    store,
    gateway,
    stepRetryDelayMs: 0,
    logger,
    createRuntime: ({ agent, teammates, guidance }) =>
      createAgentRuntime({
        agent,
        provider: providers[agent.name] ?? createScriptedProvider([]),
        registry,
        completionToken: 'TASK_COMPLETE',
        teammates,
        guidance,
        logger,
      }),
  });
  return { coordinator, store };
}

async function loadRecord(store: ConversationStore, taskId: TaskId): Promise<ConversationRecord> {
  return unwrap(await store.load(taskId));
}

function kinds(messages: readonly ConversationMessage[]): string[] {
  return messages.map((m) => m.kind);
}

/** Store a header plus the given messages, as a run interrupted mid-task would have left them. */
async function seedInterruptedTask(
  store: ConversationStore,
  team: Team,
  build: (f: ReturnType<typeof createMessageFactory>) => ConversationMessage[],
): Promise<TaskId> {
  const task = createTestTask();
  const f = createMessageFactory(task.id);
  const entries: ConversationEntry[] = [
    { type: 'task', task, team: snapshotTeam(team) },
    { type: 'status', status: 'running', at: new Date() },
    ...build(f).map((message): ConversationEntry => ({ type: 'message', message })),
  ];
  for (const entry of entries) unwrap(await store.append(task.id, entry));
  return task.id;
}

// ─── Running Tasks ──────────────────────────────────────────────

describe('TeamCoordinator.runTask', () => {
  it('completes a task through one permitted tool call', async () => {
    const tool = writeFileTool();
    const writerProvider = createScriptedProvider([
      { tool: 'write_file', input: { path: 'hello.txt', content: 'hi' } },
      { text: 'Wrote hello.txt. TASK_COMPLETE' },
    ]);
    const reviewerProvider = createScriptedProvider([]);
    const { coordinator, store } = setup({ Writer: writerProvider, Reviewer: reviewerProvider }, { tools: [tool] });
    const task = createTask("write hello.txt with content 'hi'", 'writers');

    const outcome = await coordinator.runTask(task, makeTeam());

    expect(outcome).toEqual({ taskId: task.id, status: 'completed', summary: 'Wrote hello.txt.', turns: 2 });
    expect(tool.invocations.map((i) => i.input)).toEqual([{ path: 'hello.txt', content: 'hi' }]);
    expect(reviewerProvider.calls).toHaveLength(0);

    const record = await loadRecord(store, task.id);
    expect(record.task.status).toBe('completed');
    expect(kinds(record.messages)).toEqual(['task', 'tool_call', 'tool_result', 'chat']);
    expect(record.messages.map((m) => m.seq)).toEqual([1, 2, 3, 4]);

    const [, call, result, final] = record.messages;
    expect(call?.kind === 'tool_call' && call.content).toBe('Calling write_file');
    expect(call?.kind === 'tool_call' && call.toolCall.arguments).toEqual({ path: 'hello.txt', content: 'hi' });
    expect(result?.kind === 'tool_result' && result.toolResult).toMatchObject({ status: 'ok', attempts: 1 });
    expect(result?.sender).toBe('write_file');
    expect(final?.kind === 'chat' && final.final).toBe(true);
  });

  it('refuses tools outside the allow-list without reaching the provider', async () => {
    const github = createScriptedTool('github_search', [{ ok: [] }]);
    const writerProvider = createScriptedProvider([
      { tool: 'github_search', input: { query: 'hello' } },
      { text: 'Searching is not my job. TASK_COMPLETE' },
    ]);
    const { coordinator, store } = setup({ Writer: writerProvider }, { tools: [writeFileTool(), github] });
    const task = createTask('Find a hello world repo', 'writers');

    const outcome = await coordinator.runTask(task, makeTeam());

    expect(outcome.status).toBe('completed');
    expect(github.invocations).toHaveLength(0);

    const record = await loadRecord(store, task.id);
    const result = record.messages[2];
    expect(result?.kind === 'tool_result' && result.toolResult).toMatchObject({
      status: 'error',
      error: {
        code: 'TOOL_NOT_PERMITTED',
        message: 'Agent "Writer" is not permitted to use tool "github_search"',
        retryable: false,
      },
      attempts: 0,
    });
  });

  it('fails with TURN_LIMIT_EXCEEDED when nobody completes', async () => {
    const github = createScriptedTool('github_search', [{ ok: [] }]);
    const writerProvider = createScriptedProvider([{ tool: 'github_search', input: { query: 'x' } }], {
      repeatLast: true,
    });
    const { coordinator, store } = setup({ Writer: writerProvider }, { tools: [writeFileTool(), github] });
    const task = createTask('Loop forever', 'writers');

    const outcome = await coordinator.runTask(task, makeTeam({ maxTurns: 3 }));

    expect(outcome).toEqual({
      taskId: task.id,
      status: 'failed',
      summary: '',
      reason: {
        code: 'TURN_LIMIT_EXCEEDED',
        message: `Task ${task.id} reached the limit of 3 turns without completing`,
      },
      turns: 3,
    });
    expect(writerProvider.calls).toHaveLength(3);
    expect(github.invocations).toHaveLength(0);
    const record = await loadRecord(store, task.id);
    expect(record.messages).toHaveLength(7);
  });

  it('alternates speakers round-robin', async () => {
    const writerProvider = createScriptedProvider([{ text: 'First draft' }]);
    const reviewerProvider = createScriptedProvider([{ text: 'Approved. TASK_COMPLETE' }]);
    const { coordinator, store } = setup({ Writer: writerProvider, Reviewer: reviewerProvider });
    const task = createTask('Draft a greeting', 'writers');

    const outcome = await coordinator.runTask(task, makeTeam());

    expect(outcome.summary).toBe('Approved.');
    const record = await loadRecord(store, task.id);
    expect(record.messages.map((m) => m.sender)).toEqual(['user', 'Writer', 'Reviewer']);
  });

  it('fails with BACKEND_UNAVAILABLE after step retries and keeps the history', async () => {
    const writerProvider = createScriptedProvider([{ text: 'First draft' }]);
    const reviewerProvider = createScriptedProvider([{ error: 'upstream down' }], { repeatLast: true });
    const { coordinator, store } = setup({ Writer: writerProvider, Reviewer: reviewerProvider });
    const task = createTask('Draft a greeting', 'writers');

    const outcome = await coordinator.runTask(task, makeTeam());

    expect(outcome).toEqual({
      taskId: task.id,
      status: 'failed',
      summary: 'First draft',
      reason: {
        code: 'BACKEND_UNAVAILABLE',
        message: 'LLM backend unavailable for agent "Reviewer": Provider "scripted" error: upstream down',
      },
      turns: 1,
    });
    expect(reviewerProvider.calls).toHaveLength(3);

    const record = await loadRecord(store, task.id);
    expect(record.task.status).toBe('failed');
    expect(kinds(record.messages)).toEqual(['task', 'chat']);
  });

  it('recovers from a transient backend failure', async () => {
    const writerProvider = createScriptedProvider([{ throws: 'socket hang up' }, { text: 'Done. TASK_COMPLETE' }]);
    const { coordinator } = setup({ Writer: writerProvider });

    const outcome = await coordinator.runTask(createTask('Say done', 'writers'), makeTeam());

    expect(outcome.status).toBe('completed');
    expect(writerProvider.calls).toHaveLength(2);
  });

  it('turns malformed output into a private correction', async () => {
    const writerProvider = createScriptedProvider([{ text: '' }, { text: 'Done. TASK_COMPLETE' }]);
    const { coordinator, store } = setup({ Writer: writerProvider });
    const task = createTask('Say done', 'writers');

    const outcome = await coordinator.runTask(task, makeTeam());

    expect(outcome).toEqual({ taskId: task.id, status: 'completed', summary: 'Done.', turns: 2 });
    const record = await loadRecord(store, task.id);
    expect(record.messages[1]).toMatchObject({
      kind: 'correction',
      sender: 'coordinator',
      audience: 'Writer',
      turn: 1,
      content: 'Your last reply could not be used. Your reply was empty. Try again.',
    });
  });

  it('lets the lead pick the next speaker and records the pick', async () => {
    const reviewerProvider = createScriptedProvider([{ text: 'We need a file.' }, { text: 'Writer' }]);
    const writerProvider = createScriptedProvider([{ text: 'File planned. TASK_COMPLETE' }]);
    const { coordinator, store } = setup({ Writer: writerProvider, Reviewer: reviewerProvider });
    const task = createTask('Plan a file', 'writers');
    const team = makeTeam({ routing: { type: 'coordinator-directed', lead: 'Reviewer' } });

    const outcome = await coordinator.runTask(task, team);

    expect(outcome.status).toBe('completed');
    const record = await loadRecord(store, task.id);
    expect(kinds(record.messages)).toEqual(['task', 'chat', 'speaker_selection', 'chat']);
    expect(record.messages[2]).toMatchObject({ sender: 'Reviewer', content: 'Writer speaks next.', nextSpeaker: 'Writer' });
    expect(outcome.turns).toBe(2);
  });

  it('falls back to round-robin when the lead names nobody', async () => {
    const reviewerProvider = createScriptedProvider([{ text: 'Kickoff.' }, { text: 'Not sure.' }]);
    const writerProvider = createScriptedProvider([{ text: 'On it. TASK_COMPLETE' }]);
    const { coordinator, store } = setup({ Writer: writerProvider, Reviewer: reviewerProvider });
    const task = createTask('Plan a file', 'writers');

    await coordinator.runTask(task, makeTeam({ routing: { type: 'coordinator-directed', lead: 'Reviewer' } }));

    const record = await loadRecord(store, task.id);
    expect(record.messages[2]).toMatchObject({ kind: 'speaker_selection', nextSpeaker: 'Writer' });
  });

  it('fails with CANCELLED when aborted before starting', async () => {
    const writerProvider = createScriptedProvider([{ text: 'never' }]);
    const { coordinator, store } = setup({ Writer: writerProvider });
    const task = createTask('Say done', 'writers');
    const controller = new AbortController();
    controller.abort();

    const outcome = await coordinator.runTask(task, makeTeam(), { signal: controller.signal });

    expect(outcome.reason).toEqual({ code: 'CANCELLED', message: 'Task was cancelled' });
    expect(writerProvider.calls).toHaveLength(0);
    const record = await loadRecord(store, task.id);
    expect(kinds(record.messages)).toEqual(['task']);
  });

  it('aborts an in-flight tool call on cancellation and records its result', async () => {
    const tool = writeFileTool([{ hang: true }]);
    const writerProvider = createScriptedProvider([{ tool: 'write_file', input: { path: 'a.txt', content: 'a' } }]);
    const { coordinator, store } = setup({ Writer: writerProvider }, { tools: [tool], gatewayTimeoutMs: 10_000 });
    const task = createTask('Write a.txt', 'writers');
    const controller = new AbortController();

    const running = coordinator.runTask(task, makeTeam(), { signal: controller.signal });
    await vi.waitFor(() => expect(tool.invocations).toHaveLength(1));
    controller.abort();
    const outcome = await running;

    expect(outcome.status).toBe('failed');
    expect(outcome.reason?.code).toBe('CANCELLED');
    const record = await loadRecord(store, task.id);
    expect(kinds(record.messages)).toEqual(['task', 'tool_call', 'tool_result']);
    const result = record.messages[2];
    expect(result?.kind === 'tool_result' && result.toolResult).toMatchObject({
      status: 'error',
      error: { code: 'CANCELLED' },
      attempts: 1,
    });
  });

  it('fails with INTERNAL_ERROR when the store rejects a write', async () => {
    const inner = createMemoryConversationStore();
    const store: ConversationStore = {
      ...inner,
      append: (taskId, entry) =>
        entry.type === 'message' && entry.message.kind === 'chat'
          ? Promise.resolve(err(new ConversationStoreError(taskId, 'disk full')))
          : inner.append(taskId, entry),
    };
    const { coordinator } = setup({ Writer: createScriptedProvider([{ text: 'Hello' }]) }, { store });
    const task = createTask('Say hello', 'writers');

    const outcome = await coordinator.runTask(task, makeTeam());

    expect(outcome.reason).toEqual({
      code: 'INTERNAL_ERROR',
      message: `Conversation record for task ${task.id}: disk full`,
    });
    expect((await loadRecord(inner, task.id)).task.status).toBe('failed');
  });
});

// ─── Resuming Tasks ─────────────────────────────────────────────

describe('TeamCoordinator.resumeTask', () => {
  it('closes a dangling tool call and hands the turn back to its requester', async () => {
    const tool = writeFileTool();
    const writerProvider = createScriptedProvider([{ text: 'Recovered. TASK_COMPLETE' }]);
    const { coordinator, store } = setup({ Writer: writerProvider }, { tools: [tool] });
    const team = makeTeam();
    const taskId = await seedInterruptedTask(store, team, (f) => [
      f.task('Write hello.txt'),
      f.toolCall('Writer', 'write_file', { path: 'hello.txt', content: 'hi' }),
    ]);

    const outcome = unwrap(await coordinator.resumeTask(taskId, team));

    expect(outcome).toEqual({ taskId, status: 'completed', summary: 'Recovered.', turns: 2 });
    expect(tool.invocations).toHaveLength(0);
    const record = await loadRecord(store, taskId);
    const interrupted = record.messages[2];
    expect(interrupted?.kind === 'tool_result' && interrupted.toolResult).toMatchObject({
      callId: 'call_1',
      status: 'error',
      error: { code: 'TOOL_INTERRUPTED', retryable: true },
      attempts: 0,
    });
  });

  it('picks the speaker an uninterrupted run would have picked', async () => {
    const writerProvider = createScriptedProvider([]);
    const reviewerProvider = createScriptedProvider([{ text: 'Looks good. TASK_COMPLETE' }]);
    const { coordinator, store } = setup({ Writer: writerProvider, Reviewer: reviewerProvider });
    const team = makeTeam();
    const taskId = await seedInterruptedTask(store, team, (f) => [f.task('Draft'), f.chat('Writer', 'Draft one')]);

    const outcome = unwrap(await coordinator.resumeTask(taskId, team));

    expect(outcome.status).toBe('completed');
    expect(writerProvider.calls).toHaveLength(0);
    expect(reviewerProvider.calls).toHaveLength(1);
  });

  it('follows a recorded lead choice without asking again', async () => {
    const writerProvider = createScriptedProvider([{ text: 'Done. TASK_COMPLETE' }]);
    const reviewerProvider = createScriptedProvider([]);
    const { coordinator, store } = setup({ Writer: writerProvider, Reviewer: reviewerProvider });
    const team = makeTeam({ routing: { type: 'coordinator-directed', lead: 'Reviewer' } });
    const taskId = await seedInterruptedTask(store, team, (f) => [
      f.task('Plan'),
      f.chat('Reviewer', 'Writer, go.'),
      f.selection('Writer', 'Reviewer'),
    ]);

    const outcome = unwrap(await coordinator.resumeTask(taskId, team));

    expect(outcome.status).toBe('completed');
    expect(reviewerProvider.calls).toHaveLength(0);
  });

  it('starts a task that never left pending', async () => {
    const writerProvider = createScriptedProvider([{ text: 'Done. TASK_COMPLETE' }]);
    const { coordinator, store } = setup({ Writer: writerProvider });
    const team = makeTeam();
    const task = createTestTask();
    unwrap(await store.append(task.id, { type: 'task', task, team: snapshotTeam(team) }));

    const outcome = unwrap(await coordinator.resumeTask(task.id, team));

    expect(outcome.status).toBe('completed');
    const record = await loadRecord(store, task.id);
    expect(record.messages[0]).toMatchObject({ kind: 'task', content: 'Write hello.txt' });
  });

  it('returns the recorded outcome of a finished task', async () => {
    const writerProvider = createScriptedProvider([{ text: 'Done. TASK_COMPLETE' }]);
    const { coordinator } = setup({ Writer: writerProvider });
    const task = createTask('Say done', 'writers');
    const first = await coordinator.runTask(task, makeTeam());

    const again = unwrap(await coordinator.resumeTask(task.id, makeTeam()));

    expect(again).toEqual(first);
    expect(writerProvider.calls).toHaveLength(1);
  });

  it('rejects a team that changed since the task started', async () => {
    const { coordinator, store } = setup({});
    const taskId = await seedInterruptedTask(store, makeTeam(), (f) => [f.task('Draft')]);

    const result = await coordinator.resumeTask(taskId, makeTeam({ maxTurns: 99 }));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('TEAM_MISMATCH');
  });

  it('reports unknown tasks', async () => {
    const { coordinator } = setup({});
    const result = await coordinator.resumeTask('task_missing' as TaskId, makeTeam());
    expect(!result.ok && result.error.code).toBe('NOT_FOUND');
  });
});

describe('guidanceFor', () => {
  it('explains the handoff marker under handoff routing', () => {
    const team = makeTeam({ routing: { type: 'handoff', rules: [], fallback: 'round-robin' } });
    expect(guidanceFor(team)).toEqual(['To pass the turn to a teammate, write "HANDOFF: <name>" in your message.']);
    expect(guidanceFor(makeTeam())).toEqual([]);
  });
});
