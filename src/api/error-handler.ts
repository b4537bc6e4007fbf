/**
 * Error envelope for the HTTP surface. Every failure, thrown or returned as a
 * Result, leaves as `{ success: false, error: { code, message, details? } }`.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { ConclaveError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { ApiResponse } from './types.js';

export interface ApiFailure {
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

const INTERNAL_FAILURE: ApiFailure = {
  statusCode: 500,
  code: 'INTERNAL_ERROR',
  message: 'An unexpected error occurred',
};

function isClientError(error: unknown): error is Error & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

// ─── Mapping ────────────────────────────────────────────────────

/**
 * Map a failure to its response fields. Domain errors keep their own code and
 * status; a non-operational one (a startup or wiring bug) is reported as an
 * internal error without its message.
 */
export function toApiFailure(error: unknown): ApiFailure {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
    };
  }
  if (error instanceof ConclaveError) {
    if (!error.isOperational) return INTERNAL_FAILURE;
    return {
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
      ...(error.context && { details: error.context }),
    };
  }
  // Fastify's own request errors: malformed JSON, unsupported media type
  if (isClientError(error)) {
    return { statusCode: error.statusCode, code: 'REQUEST_ERROR', message: error.message };
  }
  return INTERNAL_FAILURE;
}

// ─── Response Helpers ───────────────────────────────────────────

export async function sendSuccess(reply: FastifyReply, data: unknown, statusCode = 200): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

/** Send a domain error returned in a Result. */
export function sendFailure(reply: FastifyReply, error: ConclaveError): Promise<void> {
  const failure = toApiFailure(error);
  return sendError(reply, failure.code, failure.message, failure.statusCode, failure.details);
}

export async function sendNotFound(reply: FastifyReply, resource: string, id: string): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Global Error Handler ───────────────────────────────────────

export function registerErrorHandler(fastify: FastifyInstance, logger?: Logger): void {
  const log = logger ?? createLogger({ name: 'error-handler' });

  fastify.setErrorHandler(async (error, request, reply) => {
    const failure = toApiFailure(error);
    const context = {
      component: 'error-handler',
      method: request.method,
      url: request.url,
      code: failure.code,
      statusCode: failure.statusCode,
    };

    if (failure.statusCode >= 500) {
      log.error('Request failed', {
        ...context,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    } else {
      log.warn('Request rejected', context);
    }

    await sendError(reply, failure.code, failure.message, failure.statusCode, failure.details);
  });
}
