import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createGitHubTools } from './github.js';
import type { ToolHandle } from '../types.js';
import { createTestInvocationContext } from '@/testing/fixtures/context.js';

const context = createTestInvocationContext();

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function toolNamed(tools: ToolHandle[], name: string): ToolHandle {
  const tool = tools.find((t) => t.name === name);
  if (!tool) throw new Error(`missing tool ${name}`);
  return tool;
}

const repo = {
  full_name: 'octo/hello',
  description: 'Hello world',
  html_url: 'https://github.com/octo/hello',
  stargazers_count: 42,
  language: 'TypeScript',
  forks: 3,
};

const summarized = {
  fullName: 'octo/hello',
  description: 'Hello world',
  url: 'https://github.com/octo/hello',
  stars: 42,
  language: 'TypeScript',
};

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('GitHub tools', () => {
  it('creates the three tools', () => {
    const tools = createGitHubTools({ baseUrl: 'https://api.github.com' });
    expect(tools.map((t) => t.name)).toEqual(['github_search', 'github_list_repos', 'github_get_file']);
  });

  describe('github_search', () => {
    it('searches repositories and summarizes them', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ total_count: 1, items: [repo] }));
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com/', token: 'test-token' }), 'github_search');

      const result = await tool.invoke({ query: 'multi agent', maxResults: 2 }, context);

      expect(result).toEqual({
        ok: true,
        value: { query: 'multi agent', totalCount: 1, repositories: [summarized] },
      });
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://api.github.com/search/repositories?q=multi+agent&per_page=2');
      expect(init?.headers).toMatchObject({
        Accept: 'application/vnd.github+json',
        Authorization: 'Bearer test-token',
      });
    });

    it('omits the Authorization header without a token', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ total_count: 0, items: [] }));
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com' }), 'github_search');

      await tool.invoke({ query: 'x' }, context);

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.headers).not.toHaveProperty('Authorization');
    });
  });

  describe('github_list_repos', () => {
    it('lists a named user\'s repositories', async () => {
      fetchMock.mockResolvedValue(jsonResponse([repo]));
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com' }), 'github_list_repos');

      const result = await tool.invoke({ username: 'octo' }, context);

      expect(result).toEqual({ ok: true, value: { repositories: [summarized] } });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.github.com/users/octo/repos?sort=updated&per_page=30');
    });

    it('lists the authenticated user\'s repositories when a token is set', async () => {
      fetchMock.mockResolvedValue(jsonResponse([]));
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com', token: 'test-token' }), 'github_list_repos');

      await tool.invoke({}, context);

      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.github.com/user/repos?sort=updated&per_page=30');
    });

    it('needs a username without a token', async () => {
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com' }), 'github_list_repos');

      const result = await tool.invoke({}, context);

      expect(fetchMock).not.toHaveBeenCalled();
      expect(result.ok).toBe(false);
    });
  });

  describe('github_get_file', () => {
    it('decodes base64 file content from the default branch', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          type: 'file',
          path: 'docs/README.md',
          size: 11,
          encoding: 'base64',
          content: Buffer.from('hello world').toString('base64'),
        }),
      );
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com' }), 'github_get_file');

      const result = await tool.invoke({ repo: 'octo/hello', path: 'docs/README.md' }, context);

      expect(result).toEqual({
        ok: true,
        value: { repo: 'octo/hello', path: 'docs/README.md', branch: 'main', size: 11, content: 'hello world' },
      });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.github.com/repos/octo/hello/contents/docs/README.md?ref=main');
    });

    it('reports a directory path', async () => {
      fetchMock.mockResolvedValue(jsonResponse([{ type: 'file', name: 'a.md' }]));
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com' }), 'github_get_file');

      const result = await tool.invoke({ repo: 'octo/hello', path: 'docs', branch: 'dev' }, context);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Tool "github_get_file" failed: "docs" is a directory');
    });

    it('rejects a malformed repository name', async () => {
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com' }), 'github_get_file');

      const result = await tool.invoke({ repo: 'not-a-repo', path: 'a' }, context);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Invalid arguments for tool "github_get_file": repo: must look like "owner/name"');
      }
    });

    it('maps a 404 to an execution error', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ message: 'Not Found' }, 404));
      const tool = toolNamed(createGitHubTools({ baseUrl: 'https://api.github.com' }), 'github_get_file');

      const result = await tool.invoke({ repo: 'octo/hello', path: 'nope.md' }, context);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Tool "github_get_file" failed: HTTP 404: {"message":"Not Found"}');
      }
    });
  });
});
