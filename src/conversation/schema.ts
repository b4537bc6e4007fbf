/**
 * Zod schemas for stored log entries. Dates are written as ISO strings and
 * coerced back on read.
 */
import { z } from 'zod';
import { routingPolicySchema } from '@/config/schema.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { asTaskId, asToolCallId } from '@/core/task.js';
import type { __brand, ToolResult } from '@/core/types.js';
import type { ConversationEntry } from './types.js';

const taskIdSchema = z.string().min(1).transform(asTaskId);
const toolCallIdSchema = z.string().min(1).transform(asToolCallId);

export const taskStatusSchema = z.enum(['pending', 'running', 'completed', 'failed']);

export const taskSchema = z.object({
  id: taskIdSchema,
  description: z.string(),
  teamName: z.string(),
  createdAt: z.coerce.date(),
  status: taskStatusSchema,
});

export const teamSnapshotSchema = z.object({
  name: z.string(),
  fingerprint: z.string(),
  members: z.array(z.string()),
  routing: routingPolicySchema,
  maxTurns: z.number().int().positive(),
  afterToolResult: z.enum(['same-speaker', 'next-speaker']),
});

// ─── Tool Calls ─────────────────────────────────────────────────

const toolCallSchema = z.object({
  id: toolCallIdSchema,
  taskId: taskIdSchema,
  requesterAgent: z.string(),
  toolName: z.string(),
  arguments: z.record(z.string(), z.unknown()),
  issuedAt: z.coerce.date(),
});

const toolErrorSchema = z.object({
  code: z.enum([
    'TOOL_NOT_PERMITTED',
    'UNKNOWN_TOOL',
    'TOOL_TIMEOUT',
    'TOOL_TRANSIENT_ERROR',
    'TOOL_VALIDATION_ERROR',
    'TOOL_EXECUTION_ERROR',
    'TOOL_INTERRUPTED',
    'CANCELLED',
  ]),
  message: z.string(),
  retryable: z.boolean(),
});

const toolResultBase = {
  callId: toolCallIdSchema,
  attempts: z.number().int().min(0),
  durationMs: z.number().min(0),
  completedAt: z.coerce.date(),
};

const toolResultSchema = z
  .discriminatedUnion('status', [
    z.object({ ...toolResultBase, status: z.literal('ok'), payload: z.unknown() }),
    z.object({ ...toolResultBase, status: z.literal('error'), error: toolErrorSchema }),
  ])
  // zod marks unknown keys optional; rebuild so `payload` is always present
  .transform((result): ToolResult =>
    result.status === 'ok'
      ? {
          callId: result.callId,
          status: 'ok',
          payload: result.payload,
          attempts: result.attempts,
          durationMs: result.durationMs,
          completedAt: result.completedAt,
        }
      : result,
  );

// ─── Messages ───────────────────────────────────────────────────

const messageBase = {
  taskId: taskIdSchema,
  seq: z.number().int().positive(),
  sender: z.string(),
  content: z.string(),
  timestamp: z.coerce.date(),
};

export const conversationMessageSchema = z.discriminatedUnion('kind', [
  z.object({ ...messageBase, kind: z.literal('task'), role: z.literal('user') }),
  z.object({
    ...messageBase,
    kind: z.literal('chat'),
    role: z.literal('agent'),
    turn: z.number().int().positive(),
    final: z.boolean(),
  }),
  z.object({
    ...messageBase,
    kind: z.literal('tool_call'),
    role: z.literal('agent'),
    turn: z.number().int().positive(),
    toolCall: toolCallSchema,
  }),
  z.object({
    ...messageBase,
    kind: z.literal('tool_result'),
    role: z.literal('tool'),
    toolResult: toolResultSchema,
  }),
  z.object({
    ...messageBase,
    kind: z.literal('correction'),
    role: z.literal('system'),
    turn: z.number().int().positive(),
    audience: z.string(),
  }),
  z.object({
    ...messageBase,
    kind: z.literal('speaker_selection'),
    role: z.literal('system'),
    nextSpeaker: z.string(),
  }),
]);

// ─── Entries ────────────────────────────────────────────────────

export const conversationEntrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('task'), task: taskSchema, team: teamSnapshotSchema }),
  z.object({
    type: z.literal('status'),
    status: taskStatusSchema,
    at: z.coerce.date(),
    reason: z
      .object({
        code: z.enum(['TURN_LIMIT_EXCEEDED', 'BACKEND_UNAVAILABLE', 'CANCELLED', 'INTERNAL_ERROR']),
        message: z.string(),
      })
      .optional(),
    summary: z.string().optional(),
    turns: z.number().int().min(0).optional(),
  }),
  z.object({ type: z.literal('message'), message: conversationMessageSchema }),
]);

/** Parse one stored line; the error is a short description of what is wrong with it. */
export function parseEntry(line: string): Result<ConversationEntry, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
  const parsed = conversationEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid entry');
  }
  return ok(parsed.data);
}
