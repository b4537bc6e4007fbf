/**
 * Anthropic LLM provider adapter.
 * Wraps the @anthropic-ai/sdk to implement the LLMProvider interface.
 */
import Anthropic from '@anthropic-ai/sdk';

import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { getModelMeta } from './models.js';
import { parseToolInput } from './tool-input.js';
import type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  StopReason,
  ToolDefinitionForProvider,
} from './types.js';

const logger = createLogger({ name: 'anthropic-provider' });

/** Configuration for the Anthropic provider. */
export interface AnthropicProviderOptions {
  /** API key. Resolved from env at construction time. */
  apiKey: string;
  /** Model identifier (e.g. 'claude-3-5-sonnet-latest'). */
  model: string;
  /** Custom base URL (for proxies). */
  baseUrl?: string;
}

/** A block of a structured message turn, as the installed SDK types it. */
type AnthropicContentBlock = Exclude<Anthropic.Messages.MessageParam['content'], string>[number];

/**
 * Convert our internal Message format to Anthropic's API format.
 * System messages travel in the `system` parameter instead; tool results are user turns.
 */
function toAnthropicMessages(messages: Message[]): Anthropic.Messages.MessageParam[] {
  const result: Anthropic.Messages.MessageParam[] = [];

  for (const msg of messages) {
    if (msg.role === 'system') continue;
    const role = msg.role === 'assistant' ? 'assistant' : 'user';

    if (typeof msg.content === 'string') {
      result.push({ role, content: msg.content });
      continue;
    }

    const blocks: AnthropicContentBlock[] = [];
    for (const part of msg.content) {
      switch (part.type) {
        case 'text':
          blocks.push({ type: 'text', text: part.text });
          break;
        case 'tool_use':
          blocks.push({ type: 'tool_use', id: part.id, name: part.name, input: part.input });
          break;
        case 'tool_result':
          blocks.push({
            type: 'tool_result',
            tool_use_id: part.toolUseId,
            content: part.content,
            is_error: part.isError,
          });
          break;
      }
    }

    result.push({ role, content: blocks });
  }

  return result;
}

function toAnthropicTools(tools: ToolDefinitionForProvider[]): Anthropic.Messages.Tool[] {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: { ...t.inputSchema, type: 'object' as const },
  }));
}

function toStopReason(reason: string | null): StopReason {
  switch (reason) {
    case 'tool_use':
      return 'tool_use';
    case 'max_tokens':
      return 'max_tokens';
    case 'stop_sequence':
      return 'stop_sequence';
    default:
      return 'end_turn';
  }
}

/**
 * Anthropic provider implementing the LLMProvider interface.
 */
export function createAnthropicProvider(options: AnthropicProviderOptions): LLMProvider {
  const client = new Anthropic({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });
  const meta = getModelMeta(options.model);

  return {
    id: `anthropic:${options.model}`,
    displayName: `Anthropic ${options.model}`,

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      const anthropicMessages = toAnthropicMessages(params.messages);
      const tools = params.tools?.length ? toAnthropicTools(params.tools) : undefined;

      logger.debug('Starting chat stream', {
        component: 'anthropic',
        model: options.model,
        messageCount: anthropicMessages.length,
        toolCount: tools?.length ?? 0,
        taskId: params.taskId,
      });

      try {
        const stream = client.messages.stream(
          {
            model: options.model,
            messages: anthropicMessages,
            max_tokens: params.maxTokens,
            temperature: params.temperature,
            ...(params.systemPrompt ? { system: params.systemPrompt } : {}),
            ...(tools ? { tools } : {}),
            ...(params.stopSequences?.length ? { stop_sequences: params.stopSequences } : {}),
          },
          { signal: params.signal },
        );

        let currentToolId: string | undefined;
        let currentToolName = '';
        let toolInputJson = '';

        for await (const event of stream) {
          switch (event.type) {
            case 'message_start':
              yield { type: 'message_start', messageId: event.message.id };
              break;

            case 'content_block_start':
              if (event.content_block.type === 'tool_use') {
                currentToolId = event.content_block.id;
                currentToolName = event.content_block.name;
                toolInputJson = '';
                yield { type: 'tool_use_start', id: currentToolId, name: currentToolName };
              }
              break;

            case 'content_block_delta':
              if (event.delta.type === 'text_delta') {
                yield { type: 'content_delta', text: event.delta.text };
              } else if (event.delta.type === 'input_json_delta') {
                toolInputJson += event.delta.partial_json;
              }
              break;

            case 'content_block_stop':
              if (currentToolId) {
                const { input, inputError } = parseToolInput(toolInputJson);
                if (inputError) {
                  logger.warn('Failed to parse tool input JSON', {
                    component: 'anthropic',
                    toolCallId: currentToolId,
                    toolName: currentToolName,
                    taskId: params.taskId,
                  });
                }
                yield {
                  type: 'tool_use_end',
                  id: currentToolId,
                  name: currentToolName,
                  input,
                  ...(inputError ? { inputError } : {}),
                };
                currentToolId = undefined;
                currentToolName = '';
                toolInputJson = '';
              }
              break;

            case 'message_stop': {
              const finalMessage = await stream.finalMessage();
              yield {
                type: 'message_end',
                stopReason: toStopReason(finalMessage.stop_reason),
                usage: {
                  inputTokens: finalMessage.usage.input_tokens,
                  outputTokens: finalMessage.usage.output_tokens,
                },
              };
              break;
            }
          }
        }
      } catch (error) {
        if (error instanceof Anthropic.APIError) {
          logger.error('API error', {
            component: 'anthropic',
            status: error.status,
            errorMessage: error.message,
            taskId: params.taskId,
          });
          yield {
            type: 'error',
            error: new ProviderError('anthropic', `${error.status ?? 'no status'}: ${error.message}`, error),
          };
        } else {
          throw error;
        }
      }
    },

    getContextWindow(): number {
      return meta.contextWindow;
    },

    supportsToolUse(): boolean {
      return meta.supportsTools;
    },
  };
}
