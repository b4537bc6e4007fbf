/**
 * ToolGateway: dispatches a ToolCall to the provider the registry names,
 * under a per-attempt timeout and a bounded retry budget, and folds every
 * outcome into a ToolResult envelope. It never throws and keeps no state.
 */
import {
  ConclaveError,
  TaskCancelledError,
  ToolExecutionError,
  ToolTimeoutError,
  ToolTransientError,
  ToolValidationError,
} from '@/core/errors.js';
import { sleep } from '@/core/sleep.js';
import type { ToolCall, ToolErrorCode, ToolResult } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolRegistry } from '../registry/tool-registry.js';
import type { ToolHandle } from '../types.js';

// ─── Options ────────────────────────────────────────────────────

export interface ToolGatewayOptions {
  registry: ToolRegistry;
  /** Per-attempt timeout. Default 30s. */
  timeoutMs?: number;
  /** Retries after the first attempt for timeouts and transient failures. Default 2. */
  maxRetries?: number;
  /** Base backoff between attempts, doubled each retry. Default 250ms. */
  retryDelayMs?: number;
  logger?: Logger;
}

export interface InvokeOptions {
  /** Task-level cancellation. Aborts the in-flight attempt; the late result is discarded. */
  signal?: AbortSignal;
}

export interface ToolGateway {
  invoke(call: ToolCall, options?: InvokeOptions): Promise<ToolResult>;
}

// ─── Error Normalization ────────────────────────────────────────

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/** Codes from provider adapters that mean "try again". */
const TRANSIENT_PROVIDER_CODES = new Set(['TOOL_TRANSIENT_ERROR', 'MCP_CONNECTION_ERROR']);
const TIMEOUT_PROVIDER_CODES = new Set(['TOOL_TIMEOUT', 'MCP_TIMEOUT']);

const GATEWAY_CODES: ReadonlySet<string> = new Set<ToolErrorCode>([
  'TOOL_NOT_PERMITTED',
  'UNKNOWN_TOOL',
  'TOOL_TIMEOUT',
  'TOOL_TRANSIENT_ERROR',
  'TOOL_VALIDATION_ERROR',
  'TOOL_EXECUTION_ERROR',
  'TOOL_INTERRUPTED',
  'CANCELLED',
]);

function isGatewayCode(code: string): code is ToolErrorCode {
  return GATEWAY_CODES.has(code);
}

function networkCodeOf(error: unknown): string | undefined {
  // fetch wraps socket errors: TypeError('fetch failed', { cause: { code } })
  for (let current = error, depth = 0; current instanceof Error && depth < 4; depth++) {
    if ('code' in current && typeof current.code === 'string' && TRANSIENT_NETWORK_CODES.has(current.code)) {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Map any provider-specific failure onto the gateway taxonomy so callers
 * only ever see gateway codes.
 */
export function normalizeToolError(toolName: string, error: unknown): ConclaveError {
  if (error instanceof ConclaveError) {
    if (isGatewayCode(error.code)) return error;
    if (TIMEOUT_PROVIDER_CODES.has(error.code)) {
      const timeoutMs = error.context?.['timeoutMs'];
      return new ToolTimeoutError(toolName, typeof timeoutMs === 'number' ? timeoutMs : 0);
    }
    if (TRANSIENT_PROVIDER_CODES.has(error.code)) {
      return new ToolTransientError(toolName, error.message, error);
    }
    if (error.statusCode === 400) {
      return new ToolValidationError(toolName, error.message);
    }
    return new ToolExecutionError(toolName, error.message, error);
  }

  const networkCode = networkCodeOf(error);
  if (networkCode) {
    return new ToolTransientError(toolName, networkCode, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ToolExecutionError(toolName, message, error);
}

function isRetryable(error: ConclaveError): boolean {
  return error.code === 'TOOL_TIMEOUT' || error.code === 'TOOL_TRANSIENT_ERROR';
}

// ─── Attempts ───────────────────────────────────────────────────

type AttemptOutcome = { ok: true; value: unknown } | { ok: false; error: ConclaveError };

/**
 * Run one provider attempt. Settles with the first of: the provider's answer,
 * the per-attempt timeout, or task cancellation.
 */
function runAttempt(
  tool: ToolHandle,
  input: unknown,
  call: ToolCall,
  timeoutMs: number,
  taskSignal: AbortSignal | undefined,
): Promise<AttemptOutcome> {
  const controller = new AbortController();

  return new Promise<AttemptOutcome>((resolve) => {
    let settled = false;
    const settle = (outcome: AttemptOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      taskSignal?.removeEventListener('abort', onTaskAbort);
      resolve(outcome);
    };

    const timer = setTimeout(() => {
      const error = new ToolTimeoutError(tool.name, timeoutMs);
      controller.abort(error);
      settle({ ok: false, error });
    }, timeoutMs);

    const onTaskAbort = (): void => {
      const error = new TaskCancelledError(call.taskId, `Tool call ${call.id} was cancelled`);
      controller.abort(error);
      settle({ ok: false, error });
    };
    taskSignal?.addEventListener('abort', onTaskAbort, { once: true });

    void tool
      .invoke(input, {
        taskId: call.taskId,
        callId: call.id,
        agentName: call.requesterAgent,
        signal: controller.signal,
      })
      .then(
        (result) =>
          settle(result.ok ? { ok: true, value: result.value } : { ok: false, error: normalizeToolError(tool.name, result.error) }),
        (error: unknown) => settle({ ok: false, error: normalizeToolError(tool.name, error) }),
      );
  });
}

// ─── Gateway ────────────────────────────────────────────────────

export function createToolGateway(options: ToolGatewayOptions): ToolGateway {
  const { registry } = options;
  const timeoutMs = options.timeoutMs ?? 30_000;
  const maxRetries = options.maxRetries ?? 2;
  const retryDelayMs = options.retryDelayMs ?? 250;
  const logger = options.logger ?? createLogger({ name: 'tool-gateway' });

  function errorResult(
    call: ToolCall,
    error: ConclaveError,
    attempts: number,
    startedAt: number,
  ): ToolResult {
    const code: ToolErrorCode = isGatewayCode(error.code) ? error.code : 'TOOL_EXECUTION_ERROR';
    return {
      callId: call.id,
      status: 'error',
      error: { code, message: error.message, retryable: isRetryable(error) },
      attempts,
      durationMs: Date.now() - startedAt,
      completedAt: new Date(),
    };
  }

  return {
    async invoke(call: ToolCall, invokeOptions?: InvokeOptions): Promise<ToolResult> {
      const startedAt = Date.now();
      const signal = invokeOptions?.signal;
      const logContext = {
        component: 'tool-gateway',
        taskId: call.taskId,
        callId: call.id,
        tool: call.toolName,
        agent: call.requesterAgent,
      };

      const resolved = registry.resolve(call.toolName);
      if (!resolved.ok) {
        return errorResult(call, resolved.error, 0, startedAt);
      }
      const tool = resolved.value;

      const parsed = tool.inputSchema.safeParse(call.arguments);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        logger.warn('Tool arguments rejected', { ...logContext, issues });
        return errorResult(call, new ToolValidationError(tool.name, issues.join('; ')), 0, startedAt);
      }

      let attempts = 0;
      for (;;) {
        if (signal?.aborted) {
          return errorResult(call, new TaskCancelledError(call.taskId, `Tool call ${call.id} was cancelled`), attempts, startedAt);
        }

        attempts++;
        logger.debug('Invoking tool', { ...logContext, attempt: attempts });
        const outcome = await runAttempt(tool, parsed.data, call, timeoutMs, signal);

        if (outcome.ok) {
          logger.info('Tool call succeeded', { ...logContext, attempts, durationMs: Date.now() - startedAt });
          return {
            callId: call.id,
            status: 'ok',
            payload: outcome.value,
            attempts,
            durationMs: Date.now() - startedAt,
            completedAt: new Date(),
          };
        }

        const error = outcome.error;
        if (!isRetryable(error) || attempts > maxRetries || signal?.aborted) {
          logger.warn('Tool call failed', { ...logContext, attempts, code: error.code, error: error.message });
          return errorResult(call, error, attempts, startedAt);
        }

        const delay = retryDelayMs * 2 ** (attempts - 1);
        logger.info('Retrying tool call', { ...logContext, attempt: attempts, code: error.code, delayMs: delay });
        await sleep(delay, signal);
      }
    },
  };
}
