/**
 * AgentRuntime: one agent's call into its LLM backend.
 *
 * The runtime is stateless between steps. Each step renders the shared
 * record from the agent's perspective, streams a completion and parses it
 * into an AgentOutput. Backend failures come back as BackendUnavailableError
 * for the coordinator to retry; unusable output comes back as `malformed`.
 */
import { BackendUnavailableError, TaskCancelledError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ConversationMessage, TaskId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { ChatParams, LLMProvider, Message } from '@/providers/types.js';
import type { ToolRegistry } from '@/tools/registry/tool-registry.js';
import { renderHistory } from './history-view.js';
import { pickSpeaker } from './speaker-choice.js';
import type { AgentDefinition, AgentOutput, TeammateInfo } from './types.js';

const DEFAULT_MAX_OUTPUT_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.7;

// ─── Types ──────────────────────────────────────────────────────

export interface AgentRuntimeOptions {
  agent: AgentDefinition;
  provider: LLMProvider;
  registry: ToolRegistry;
  /** Marker an agent writes when the task is done. */
  completionToken: string;
  teammates?: readonly TeammateInfo[];
  /** Extra system prompt lines, e.g. how to hand off under handoff routing. */
  guidance?: readonly string[];
  logger?: Logger;
}

export interface StepOptions {
  taskId: TaskId;
  signal?: AbortSignal;
}

export type AgentStepError = BackendUnavailableError | TaskCancelledError;

export interface AgentRuntime {
  readonly agent: AgentDefinition;

  /** Produce this agent's next output from the shared record. */
  step(
    history: readonly ConversationMessage[],
    options: StepOptions,
  ): Promise<Result<AgentOutput, AgentStepError>>;

  /**
   * Ask this agent, as lead, who should act next.
   * Resolves to undefined when the reply names no candidate.
   */
  selectSpeaker(
    history: readonly ConversationMessage[],
    candidates: readonly TeammateInfo[],
    options: StepOptions,
  ): Promise<Result<string | undefined, AgentStepError>>;
}

interface Completion {
  text: string;
  toolUses: { name: string; input: Record<string, unknown>; inputError?: string }[];
}

// ─── Prompt ─────────────────────────────────────────────────────

export function buildSystemPrompt(options: AgentRuntimeOptions): string {
  const { agent, completionToken, teammates = [], guidance = [] } = options;
  const sections = [
    agent.description ? `You are ${agent.name}, ${agent.description}.` : `You are ${agent.name}.`,
    agent.instructions.trim(),
  ];

  const others = teammates.filter((t) => t.name !== agent.name);
  if (others.length > 0) {
    sections.push(
      [
        'You work with a team on a shared task. Messages from teammates are prefixed with their name. Your teammates:',
        ...others.map((t) => (t.description ? `- ${t.name}: ${t.description}` : `- ${t.name}`)),
      ].join('\n'),
    );
  }

  const rules = [
    `When the whole task is finished, say so and include ${completionToken} in your message.`,
  ];
  if (agent.allowedTools.length > 0) {
    rules.push(`You may call these tools, one per turn: ${agent.allowedTools.join(', ')}.`);
  } else {
    rules.push('You have no tools; answer in text.');
  }
  sections.push([...rules, ...guidance].join('\n'));

  return sections.join('\n\n');
}

/** Remove the completion marker from a final message. */
export function stripCompletionToken(text: string, completionToken: string): string {
  return text.split(completionToken).join('').trim();
}

// ─── Factory ────────────────────────────────────────────────────

export function createAgentRuntime(options: AgentRuntimeOptions): AgentRuntime {
  const { agent, provider, registry, completionToken } = options;
  const logger = options.logger ?? createLogger({ name: 'agent-runtime' });
  const systemPrompt = buildSystemPrompt(options);
  const tools = provider.supportsToolUse() ? registry.formatForProvider(agent.allowedTools) : [];

  function failure(error: unknown, stepOptions: StepOptions): AgentStepError {
    if (stepOptions.signal?.aborted) {
      return new TaskCancelledError(stepOptions.taskId);
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error('LLM backend call failed', {
      component: 'agent-runtime',
      taskId: stepOptions.taskId,
      agent: agent.name,
      provider: provider.id,
      error: message,
    });
    return new BackendUnavailableError(agent.name, message, error);
  }

  async function complete(
    params: Omit<ChatParams, 'maxTokens' | 'temperature' | 'signal' | 'taskId'>,
    stepOptions: StepOptions,
  ): Promise<Result<Completion, AgentStepError>> {
    if (stepOptions.signal?.aborted) {
      return err(new TaskCancelledError(stepOptions.taskId));
    }

    const completion: Completion = { text: '', toolUses: [] };
    try {
      for await (const event of provider.chat({
        ...params,
        maxTokens: agent.llm.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        temperature: agent.llm.temperature ?? DEFAULT_TEMPERATURE,
        signal: stepOptions.signal,
        taskId: stepOptions.taskId,
      })) {
        switch (event.type) {
          case 'content_delta':
            completion.text += event.text;
            break;
          case 'tool_use_end':
            completion.toolUses.push({
              name: event.name,
              input: event.input,
              ...(event.inputError !== undefined ? { inputError: event.inputError } : {}),
            });
            break;
          case 'error':
            return err(failure(event.error, stepOptions));
          case 'message_start':
          case 'tool_use_start':
          case 'message_end':
            break;
        }
      }
    } catch (error) {
      return err(failure(error, stepOptions));
    }
    return ok(completion);
  }

  function parse(completion: Completion): AgentOutput {
    const text = completion.text.trim();
    const [first, ...rest] = completion.toolUses;

    if (first && rest.length > 0) {
      const names = completion.toolUses.map((t) => t.name).join(', ');
      return {
        kind: 'malformed',
        reason: `Request one tool per turn; you requested ${completion.toolUses.length} (${names}).`,
        raw: completion.text,
      };
    }
    if (first) {
      if (first.name.trim() === '') {
        return { kind: 'malformed', reason: 'Your tool call did not name a tool.', raw: completion.text };
      }
      if (first.inputError !== undefined) {
        return {
          kind: 'malformed',
          reason: `The arguments for ${first.name} were not a valid JSON object (${first.inputError}).`,
          raw: completion.text,
        };
      }
      return { kind: 'tool_request', toolName: first.name, arguments: first.input, text };
    }
    if (text === '') {
      return { kind: 'malformed', reason: 'Your reply was empty.', raw: completion.text };
    }
    return { kind: 'message', text, complete: text.includes(completionToken) };
  }

  return {
    agent,

    async step(history, stepOptions) {
      const result = await complete(
        {
          systemPrompt,
          messages: renderHistory(history, agent.name),
          ...(tools.length > 0 ? { tools } : {}),
        },
        stepOptions,
      );
      if (!result.ok) return result;

      const output = parse(result.value);
      if (output.kind === 'malformed') {
        logger.warn('Agent produced malformed output', {
          component: 'agent-runtime',
          taskId: stepOptions.taskId,
          agent: agent.name,
          reason: output.reason,
        });
      } else {
        logger.debug('Agent step completed', {
          component: 'agent-runtime',
          taskId: stepOptions.taskId,
          agent: agent.name,
          output: output.kind,
        });
      }
      return ok(output);
    },

    async selectSpeaker(history, candidates, stepOptions) {
      const names = candidates.map((c) => c.name);
      const roster = candidates.map((c) => (c.description ? `- ${c.name}: ${c.description}` : `- ${c.name}`));
      const question: Message = {
        role: 'user',
        content: [
          'As team lead, decide who should act next. Candidates:',
          ...roster,
          `Reply with exactly one name from: ${names.join(', ')}.`,
        ].join('\n'),
      };

      const result = await complete(
        { systemPrompt, messages: [...renderHistory(history, agent.name), question] },
        stepOptions,
      );
      if (!result.ok) return result;

      const choice = pickSpeaker(result.value.text, names);
      logger.debug('Lead selected next speaker', {
        component: 'agent-runtime',
        taskId: stepOptions.taskId,
        agent: agent.name,
        reply: result.value.text,
        choice,
      });
      return ok(choice);
    },
  };
}
