/**
 * JSON-over-HTTP helper shared by the web tools.
 */
import type { ConclaveError } from '@/core/errors.js';
import { ToolExecutionError, ToolTimeoutError, ToolTransientError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

export interface FetchJsonOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  signal: AbortSignal;
  timeoutMs: number;
}

/**
 * Fetch a URL and parse the JSON body.
 * 429 and 5xx answers are transient; other non-2xx answers are execution errors.
 * Socket failures propagate as thrown errors for the gateway to classify.
 */
export async function fetchJson(
  toolName: string,
  url: string,
  options: FetchJsonOptions,
): Promise<Result<unknown, ConclaveError>> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: {
        Accept: 'application/json',
        ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...options.headers,
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: AbortSignal.any([options.signal, AbortSignal.timeout(options.timeoutMs)]),
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      return err(new ToolTimeoutError(toolName, options.timeoutMs));
    }
    throw error;
  }

  if (!response.ok) {
    const detail = (await response.text()).slice(0, 500);
    const message = `HTTP ${response.status}${detail ? `: ${detail}` : ''}`;
    if (response.status === 429 || response.status >= 500) {
      return err(new ToolTransientError(toolName, message));
    }
    return err(new ToolExecutionError(toolName, message));
  }

  try {
    return ok(await response.json());
  } catch (error) {
    return err(new ToolExecutionError(toolName, 'response was not valid JSON', error));
  }
}
