import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { bootstrap, composeTools } from './bootstrap.js';
import { conclaveConfigSchema } from '@/config/schema.js';
import { createMemoryConversationStore } from '@/conversation/memory-store.js';
import { unwrap } from '@/core/result.js';
import type { LLMProviderConfig } from '@/core/types.js';
import type { MCPManager } from '@/mcp/mcp-manager.js';
import { createScriptedTool } from '@/testing/fixtures/tools.js';
import { createMockLogger } from '@/testing/helpers/mock-logger.js';
import { createScriptedProvider } from '@/testing/helpers/scripted-provider.js';

const config = conclaveConfigSchema.parse({
  llm: { provider: 'groq', model: 'llama3-8b-8192' },
  agents: [
    { name: 'Writer', instructions: 'Write files.', allowedTools: ['write_file'] },
    { name: 'Reviewer', instructions: 'Review files.', llm: { provider: 'ollama', model: 'llama3' } },
  ],
  teams: [{ name: 'writers', members: ['Writer', 'Reviewer'] }],
  mcpServers: [{ name: 'files', transport: 'sse', url: 'http://localhost:9000/sse' }],
});

function fakeMCPManager(tools = [createScriptedTool('read_file', [{ ok: 'remote' }], {
  provider: { kind: 'mcp', serverName: 'files' },
})]): MCPManager {
  return {
    connectAll: vi.fn(() => Promise.resolve()),
    disconnectAll: vi.fn(() => Promise.resolve()),
    listConnections: vi.fn(() => []),
    getTools: vi.fn(() => tools),
  };
}

describe('composeTools', () => {
  it('lets an MCP tool replace the local tool of the same name', () => {
    const local = [createScriptedTool('read_file', []), createScriptedTool('write_file', [])];
    const remote = [createScriptedTool('read_file', [], { provider: { kind: 'mcp', serverName: 'files' } })];

    const tools = composeTools(local, remote);

    expect(tools.map((t) => [t.name, t.provider.kind])).toEqual([
      ['write_file', 'local'],
      ['read_file', 'mcp'],
    ]);
  });
});

describe('bootstrap', () => {
  it('builds one backend per agent from the merged llm settings', async () => {
    const makeProvider = vi.fn((_config: LLMProviderConfig) => createScriptedProvider([]));

    await bootstrap(config, {
      logger: createMockLogger(),
      createProvider: makeProvider,
      mcpManager: fakeMCPManager(),
      store: createMemoryConversationStore(),
    });

    expect(makeProvider.mock.calls.map(([c]) => [c.provider, c.model])).toEqual([
      ['groq', 'llama3-8b-8192'],
      ['ollama', 'llama3'],
    ]);
  });

  it('registers local and MCP tools, preferring the MCP server', async () => {
    const mcpManager = fakeMCPManager();

    const services = await bootstrap(config, {
      logger: createMockLogger(),
      createProvider: () => createScriptedProvider([]),
      mcpManager,
      store: createMemoryConversationStore(),
    });

    expect(mcpManager.connectAll).toHaveBeenCalledWith(config.mcpServers);
    expect(services.registry.listAll()).toEqual([
      'github_get_file',
      'github_list_repos',
      'github_search',
      'list_files',
      'read_file',
      'web_search',
      'write_file',
    ]);
    expect(unwrap(services.registry.resolve('read_file')).provider).toEqual({ kind: 'mcp', serverName: 'files' });
  });

  it('runs tasks through the wired services and disconnects on shutdown', async () => {
    const mcpManager = fakeMCPManager([]);
    const writeFile = createScriptedTool('write_file', [{ ok: 'written' }], {
      inputSchema: z.object({ path: z.string(), content: z.string() }),
    });
    const services = await bootstrap(config, {
      logger: createMockLogger(),
      createProvider: (llm) =>
        createScriptedProvider(llm.provider === 'groq' ? [{ text: 'All done. TASK_COMPLETE' }] : []),
      mcpManager: { ...mcpManager, getTools: () => [writeFile] },
      store: createMemoryConversationStore(),
    });

    const outcome = unwrap(await services.taskManager.run('Say done', 'writers'));
    await services.shutdown();

    expect(outcome.status).toBe('completed');
    expect(outcome.summary).toBe('All done.');
    expect(mcpManager.disconnectAll).toHaveBeenCalledTimes(1);
  });
});
