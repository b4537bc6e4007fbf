/**
 * OpenAI LLM provider adapter.
 * Wraps the openai SDK to implement the LLMProvider interface.
 * Also serves OpenAI-compatible APIs (Groq, Ollama) via baseUrl.
 */
import OpenAI from 'openai';

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

const logger = createLogger({ name: 'openai-provider' });

/** Configuration for the OpenAI provider. */
export interface OpenAIProviderOptions {
  /** API key. Resolved from env at construction time. */
  apiKey: string;
  /** Model identifier (e.g. 'gpt-4o', 'llama3-8b-8192'). */
  model: string;
  /** Custom base URL (Groq, Ollama, proxies). */
  baseUrl?: string;
  /** Provider label for logging/display. Defaults to 'openai'. */
  providerLabel?: string;
}

/**
 * Convert our internal Message format to OpenAI's chat completion format.
 */
function toOpenAIMessages(
  messages: Message[],
  systemPrompt?: string,
): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  const result: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];

  if (systemPrompt) {
    result.push({ role: 'system', content: systemPrompt });
  }

  for (const msg of messages) {
    if (typeof msg.content === 'string') {
      if (msg.role === 'system') {
        result.push({ role: 'system', content: msg.content });
      } else if (msg.role === 'assistant') {
        result.push({ role: 'assistant', content: msg.content });
      } else {
        result.push({ role: 'user', content: msg.content });
      }
      continue;
    }

    const toolCalls: OpenAI.Chat.Completions.ChatCompletionMessageToolCall[] = [];
    const textParts: string[] = [];
    const toolResults: { toolCallId: string; content: string }[] = [];

    for (const part of msg.content) {
      switch (part.type) {
        case 'text':
          textParts.push(part.text);
          break;
        case 'tool_use':
          toolCalls.push({
            id: part.id,
            type: 'function',
            function: { name: part.name, arguments: JSON.stringify(part.input) },
          });
          break;
        case 'tool_result':
          toolResults.push({
            toolCallId: part.toolUseId,
            content: part.isError ? `Error: ${part.content}` : part.content,
          });
          break;
      }
    }

    const text = textParts.join('');
    if (msg.role === 'assistant') {
      result.push({
        role: 'assistant',
        content: text === '' ? null : text,
        ...(toolCalls.length ? { tool_calls: toolCalls } : {}),
      });
    } else if (toolResults.length > 0) {
      // Tool results are individual "tool" role messages in OpenAI's format
      for (const tr of toolResults) {
        result.push({ role: 'tool', tool_call_id: tr.toolCallId, content: tr.content });
      }
    } else {
      result.push({ role: 'user', content: text });
    }
  }

  return result;
}

function toOpenAITools(
  tools: ToolDefinitionForProvider[],
): OpenAI.Chat.Completions.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    },
  }));
}

function toStopReason(finishReason: string): StopReason {
  switch (finishReason) {
    case 'tool_calls':
    case 'function_call':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return 'end_turn';
  }
}

/**
 * OpenAI provider implementing the LLMProvider interface.
 */
export function createOpenAIProvider(options: OpenAIProviderOptions): LLMProvider {
  const label = options.providerLabel ?? 'openai';
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });
  const meta = getModelMeta(options.model);

  return {
    id: `${label}:${options.model}`,
    displayName: `${label.charAt(0).toUpperCase()}${label.slice(1)} ${options.model}`,

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      const openaiMessages = toOpenAIMessages(params.messages, params.systemPrompt);
      const tools = params.tools?.length ? toOpenAITools(params.tools) : undefined;

      logger.debug('Starting chat stream', {
        component: label,
        model: options.model,
        messageCount: openaiMessages.length,
        toolCount: tools?.length ?? 0,
        taskId: params.taskId,
      });

      try {
        const stream = await client.chat.completions.create(
          {
            model: options.model,
            messages: openaiMessages,
            max_tokens: params.maxTokens,
            temperature: params.temperature,
            stream: true,
            ...(tools ? { tools } : {}),
            ...(params.stopSequences?.length ? { stop: params.stopSequences } : {}),
          },
          { signal: params.signal },
        );

        let messageId = '';
        // Tool calls are assembled from argument deltas keyed by index
        const toolCallBuffers = new Map<number, { id: string; name: string; argumentsJson: string }>();

        for await (const chunk of stream) {
          const choice = chunk.choices[0];
          if (!choice) continue;

          if (chunk.id && !messageId) {
            messageId = chunk.id;
            yield { type: 'message_start', messageId };
          }

          const delta = choice.delta;

          if (delta.content) {
            yield { type: 'content_delta', text: delta.content };
          }

          if (delta.tool_calls) {
            for (const tc of delta.tool_calls) {
              let buffer = toolCallBuffers.get(tc.index);

              if (!buffer && tc.id) {
                buffer = { id: tc.id, name: tc.function?.name ?? '', argumentsJson: '' };
                toolCallBuffers.set(tc.index, buffer);
                yield { type: 'tool_use_start', id: buffer.id, name: buffer.name };
              }

              if (buffer && tc.function?.arguments) {
                buffer.argumentsJson += tc.function.arguments;
              }
            }
          }

          if (choice.finish_reason) {
            for (const [, buffer] of toolCallBuffers) {
              const { input, inputError } = parseToolInput(buffer.argumentsJson);
              if (inputError) {
                logger.warn('Failed to parse tool call arguments', {
                  component: label,
                  toolCallId: buffer.id,
                  toolName: buffer.name,
                  taskId: params.taskId,
                });
              }
              yield {
                type: 'tool_use_end',
                id: buffer.id,
                name: buffer.name,
                input,
                ...(inputError ? { inputError } : {}),
              };
            }
            toolCallBuffers.clear();

            yield {
              type: 'message_end',
              stopReason: toStopReason(choice.finish_reason),
              usage: {
                inputTokens: chunk.usage?.prompt_tokens ?? 0,
                outputTokens: chunk.usage?.completion_tokens ?? 0,
              },
            };
          }
        }
      } catch (error) {
        if (error instanceof OpenAI.APIError) {
          logger.error('API error', {
            component: label,
            status: error.status,
            errorMessage: error.message,
            taskId: params.taskId,
          });
          yield {
            type: 'error',
            error: new ProviderError(label, `${error.status ?? 'no status'}: ${error.message}`, error),
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
