/**
 * Web Search Tool: searches the web via the Tavily API.
 * The API key is read from the environment variable named in config (default TAVILY_API_KEY).
 */
import { z } from 'zod';
import { ok, err } from '@/core/result.js';
import { ToolExecutionError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { defineLocalTool } from '../define-tool.js';
import type { ToolHandle } from '../types.js';
import { fetchJson } from './http.js';

const logger = createLogger({ name: 'web-search' });

// ─── Constants ──────────────────────────────────────────────────

const TAVILY_API_URL = 'https://api.tavily.com/search';
const REQUEST_TIMEOUT_MS = 15_000;
const MAX_RESULTS_LIMIT = 10;

// ─── Schemas ────────────────────────────────────────────────────

const inputSchema = z.object({
  query: z.string().min(1).max(2000).describe('Search query'),
  maxResults: z.number().int().min(1).max(MAX_RESULTS_LIMIT).default(5)
    .describe('Maximum number of results to return (1-10)'),
});

const tavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      content: z.string(),
      score: z.number(),
    }),
  ),
});

// ─── Options ────────────────────────────────────────────────────

export interface WebSearchToolOptions {
  /** Tavily API key; the tool reports an execution error when it is missing. */
  apiKey?: string;
}

// ─── Factory ────────────────────────────────────────────────────

export function createWebSearchTool(options: WebSearchToolOptions): ToolHandle {
  return defineLocalTool({
    name: 'web_search',
    description: 'Searches the web and returns titles, URLs, content snippets and relevance scores.',
    inputSchema,

    async run(input, context) {
      if (!options.apiKey) {
        return err(new ToolExecutionError('web_search', 'no Tavily API key configured'));
      }

      const response = await fetchJson('web_search', TAVILY_API_URL, {
        method: 'POST',
        body: {
          api_key: options.apiKey,
          query: input.query,
          max_results: input.maxResults,
          include_answer: false,
        },
        signal: context.signal,
        timeoutMs: REQUEST_TIMEOUT_MS,
      });
      if (!response.ok) return response;

      const parsed = tavilyResponseSchema.safeParse(response.value);
      if (!parsed.success) {
        return err(new ToolExecutionError('web_search', 'unexpected response from Tavily'));
      }

      logger.info('Web search completed', {
        component: 'web-search',
        taskId: context.taskId,
        agent: context.agentName,
        query: input.query,
        resultsCount: parsed.data.results.length,
      });

      return ok({ query: input.query, results: parsed.data.results });
    },
  });
}
