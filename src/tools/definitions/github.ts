/**
 * GitHub tools: repository search, repository listing and file retrieval
 * through the GitHub REST API. A token raises rate limits and is required
 * to list the authenticated user's own repositories.
 */
import { z } from 'zod';
import type { ConclaveError } from '@/core/errors.js';
import { ToolExecutionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import { defineLocalTool } from '../define-tool.js';
import type { ToolHandle, ToolInvocationContext } from '../types.js';
import { fetchJson } from './http.js';

const logger = createLogger({ name: 'github' });

const REQUEST_TIMEOUT_MS = 15_000;
const API_VERSION = '2022-11-28';

// ─── Schemas ────────────────────────────────────────────────────

const searchInputSchema = z.object({
  query: z.string().min(1).max(256).describe('GitHub repository search query'),
  maxResults: z.number().int().min(1).max(30).default(5).describe('Maximum repositories to return (1-30)'),
});

const listReposInputSchema = z.object({
  username: z.string().min(1).optional()
    .describe('GitHub user whose public repositories to list; omit for the authenticated user'),
});

const getFileInputSchema = z.object({
  repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'must look like "owner/name"').describe('Repository as owner/name'),
  path: z.string().min(1).describe('File path inside the repository'),
  branch: z.string().min(1).default('main').describe('Branch, tag or commit (default: main)'),
});

const repoSchema = z.object({
  full_name: z.string(),
  description: z.string().nullable(),
  html_url: z.string(),
  stargazers_count: z.number(),
  language: z.string().nullable(),
});

const searchResponseSchema = z.object({
  total_count: z.number(),
  items: z.array(repoSchema),
});

const fileResponseSchema = z.object({
  type: z.literal('file'),
  path: z.string(),
  size: z.number(),
  encoding: z.literal('base64'),
  content: z.string(),
});

type GitHubRepo = z.infer<typeof repoSchema>;

function summarizeRepo(repo: GitHubRepo): Record<string, unknown> {
  return {
    fullName: repo.full_name,
    description: repo.description,
    url: repo.html_url,
    stars: repo.stargazers_count,
    language: repo.language,
  };
}

// ─── Options ────────────────────────────────────────────────────

export interface GitHubToolsOptions {
  token?: string;
  baseUrl: string;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create the github_search, github_list_repos and github_get_file tools. */
export function createGitHubTools(options: GitHubToolsOptions): ToolHandle[] {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  function request(
    toolName: string,
    pathAndQuery: string,
    context: ToolInvocationContext,
  ): Promise<Result<unknown, ConclaveError>> {
    return fetchJson(toolName, `${baseUrl}${pathAndQuery}`, {
      headers: {
        Accept: 'application/vnd.github+json',
        'User-Agent': 'conclave',
        'X-GitHub-Api-Version': API_VERSION,
        ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
      },
      signal: context.signal,
      timeoutMs: REQUEST_TIMEOUT_MS,
    });
  }

  const search = defineLocalTool({
    name: 'github_search',
    description: 'Searches GitHub repositories and returns name, description, URL, stars and language.',
    inputSchema: searchInputSchema,

    async run(input, context) {
      const params = new URLSearchParams({ q: input.query, per_page: String(input.maxResults) });
      const response = await request('github_search', `/search/repositories?${params.toString()}`, context);
      if (!response.ok) return response;

      const parsed = searchResponseSchema.safeParse(response.value);
      if (!parsed.success) {
        return err(new ToolExecutionError('github_search', 'unexpected response from GitHub'));
      }

      logger.info('GitHub search completed', {
        component: 'github',
        taskId: context.taskId,
        query: input.query,
        resultsCount: parsed.data.items.length,
      });

      return ok({
        query: input.query,
        totalCount: parsed.data.total_count,
        repositories: parsed.data.items.map(summarizeRepo),
      });
    },
  });

  const listRepos = defineLocalTool({
    name: 'github_list_repos',
    description: 'Lists GitHub repositories of a user, or of the authenticated user when no username is given.',
    inputSchema: listReposInputSchema,

    async run(input, context) {
      let path: string;
      if (input.username) {
        path = `/users/${encodeURIComponent(input.username)}/repos?sort=updated&per_page=30`;
      } else if (options.token) {
        path = '/user/repos?sort=updated&per_page=30';
      } else {
        return err(new ToolExecutionError('github_list_repos', 'a username is required when no GitHub token is configured'));
      }

      const response = await request('github_list_repos', path, context);
      if (!response.ok) return response;

      const parsed = z.array(repoSchema).safeParse(response.value);
      if (!parsed.success) {
        return err(new ToolExecutionError('github_list_repos', 'unexpected response from GitHub'));
      }
      return ok({ repositories: parsed.data.map(summarizeRepo) });
    },
  });

  const getFile = defineLocalTool({
    name: 'github_get_file',
    description: 'Returns the text content of a file in a GitHub repository.',
    inputSchema: getFileInputSchema,

    async run(input, context) {
      const encodedPath = input.path.split('/').filter(Boolean).map(encodeURIComponent).join('/');
      const params = new URLSearchParams({ ref: input.branch });
      const response = await request(
        'github_get_file',
        `/repos/${input.repo}/contents/${encodedPath}?${params.toString()}`,
        context,
      );
      if (!response.ok) return response;

      if (Array.isArray(response.value)) {
        return err(new ToolExecutionError('github_get_file', `"${input.path}" is a directory`));
      }
      const parsed = fileResponseSchema.safeParse(response.value);
      if (!parsed.success) {
        return err(new ToolExecutionError('github_get_file', `"${input.path}" is not a regular file`));
      }

      return ok({
        repo: input.repo,
        path: parsed.data.path,
        branch: input.branch,
        size: parsed.data.size,
        content: Buffer.from(parsed.data.content, 'base64').toString('utf-8'),
      });
    },
  });

  return [search, listRepos, getFile];
}
