/**
 * Renders the shared conversation record as one agent sees it.
 *
 * Every agent sees the same messages in the same order. What differs is
 * perspective: an agent's own messages and tool exchanges are rendered as
 * assistant turns, everyone else's as attributed user text. Corrections are
 * private to their audience.
 */
import type { ConversationMessage, ToolCallMessage, ToolResult } from '@/core/types.js';
import type { Message } from '@/providers/types.js';

/** Longest tool payload rendered into a prompt. */
const MAX_TOOL_OUTPUT_CHARS = 16_000;

export function renderToolResult(result: ToolResult): string {
  if (result.status === 'error') {
    return `${result.error.code}: ${result.error.message}`;
  }
  const text = typeof result.payload === 'string' ? result.payload : JSON.stringify(result.payload, null, 2);
  if (text === undefined) return '(no output)';
  return text.length > MAX_TOOL_OUTPUT_CHARS
    ? `${text.slice(0, MAX_TOOL_OUTPUT_CHARS)}\n[truncated ${text.length - MAX_TOOL_OUTPUT_CHARS} characters]`
    : text;
}

/** Convert the record into provider messages from `viewer`'s point of view. */
export function renderHistory(history: readonly ConversationMessage[], viewer: string): Message[] {
  const calls = new Map<string, ToolCallMessage>();
  const answered = new Set<string>();
  for (const message of history) {
    if (message.kind === 'tool_call') calls.set(message.toolCall.id, message);
    if (message.kind === 'tool_result') answered.add(message.toolResult.callId);
  }

  const rendered: Message[] = [];
  for (const message of history) {
    switch (message.kind) {
      case 'task':
        rendered.push({ role: 'user', content: `Task: ${message.content}` });
        break;

      case 'chat':
        rendered.push(
          message.sender === viewer
            ? { role: 'assistant', content: message.content }
            : { role: 'user', content: `[${message.sender}]: ${message.content}` },
        );
        break;

      case 'tool_call': {
        const { toolCall } = message;
        if (message.sender !== viewer) {
          rendered.push({
            role: 'user',
            content: `[${message.sender}] called ${toolCall.toolName} with ${JSON.stringify(toolCall.arguments)}`,
          });
        } else if (answered.has(toolCall.id)) {
          rendered.push({
            role: 'assistant',
            content: [
              { type: 'text', text: message.content },
              { type: 'tool_use', id: toolCall.id, name: toolCall.toolName, input: toolCall.arguments },
            ],
          });
        } else {
          // A tool_use without its result is rejected by providers
          rendered.push({ role: 'assistant', content: message.content });
        }
        break;
      }

      case 'tool_result': {
        const call = calls.get(message.toolResult.callId);
        const output = renderToolResult(message.toolResult);
        if (call?.sender === viewer) {
          rendered.push({
            role: 'tool',
            content: [
              {
                type: 'tool_result',
                toolUseId: message.toolResult.callId,
                content: output,
                isError: message.toolResult.status === 'error',
              },
            ],
          });
        } else {
          const requester = call ? ` for ${call.sender}` : '';
          rendered.push({ role: 'user', content: `[${message.sender} result${requester}]: ${output}` });
        }
        break;
      }

      case 'correction':
        if (message.audience === viewer) {
          rendered.push({ role: 'user', content: `[coordinator]: ${message.content}` });
        }
        break;

      case 'speaker_selection':
        rendered.push({ role: 'user', content: `[coordinator]: ${message.content}` });
        break;
    }
  }
  return rendered;
}
