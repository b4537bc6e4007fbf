import { describe, it, expect, vi } from 'vitest';
import { createMCPToolHandle, extractText, getMCPToolInputSchema } from './mcp-tool-adapter.js';
import { MCPConnectionError } from './errors.js';
import type { MCPConnection, MCPToolInfo, MCPToolResult } from './types.js';
import { createTestInvocationContext } from '@/testing/fixtures/context.js';

const searchTool: MCPToolInfo = {
  name: 'search_docs',
  description: 'Searches documentation',
  inputSchema: { type: 'object', properties: { q: { type: 'string' } }, required: ['q'] },
};

function createMockConnection(
  callTool: MCPConnection['callTool'] = () => Promise.resolve({ content: [{ type: 'text', text: 'found it' }] }),
): MCPConnection {
  return {
    serverName: 'docs',
    status: 'connected',
    listTools: vi.fn(() => Promise.resolve([searchTool])),
    callTool: vi.fn(callTool),
    close: vi.fn(() => Promise.resolve()),
  };
}

describe('createMCPToolHandle', () => {
  it('exposes the tool under its plain name with the server schema', () => {
    const handle = createMCPToolHandle({ serverName: 'docs', toolInfo: searchTool, connection: createMockConnection() });

    expect(handle.name).toBe('search_docs');
    expect(handle.description).toBe('Searches documentation');
    expect(handle.provider).toEqual({ kind: 'mcp', serverName: 'docs' });
    expect(handle.jsonSchema).toBe(searchTool.inputSchema);
  });

  it('falls back to a generic description', () => {
    const handle = createMCPToolHandle({
      serverName: 'docs',
      toolInfo: { ...searchTool, description: '' },
      connection: createMockConnection(),
    });
    expect(handle.description).toBe('MCP tool from docs');
  });

  it('calls the server with the arguments and the invocation signal', async () => {
    const connection = createMockConnection();
    const handle = createMCPToolHandle({ serverName: 'docs', toolInfo: searchTool, connection });
    const context = createTestInvocationContext();

    const result = await handle.invoke({ q: 'routing' }, context);

    expect(result).toEqual({ ok: true, value: 'found it' });
    expect(connection.callTool).toHaveBeenCalledWith('search_docs', { q: 'routing' }, { signal: context.signal });
  });

  it('turns a tool-level error into MCP_TOOL_EXECUTION_ERROR', async () => {
    const connection = createMockConnection(() =>
      Promise.resolve({ content: [{ type: 'text', text: 'index unavailable' }], isError: true }),
    );
    const handle = createMCPToolHandle({ serverName: 'docs', toolInfo: searchTool, connection });

    const result = await handle.invoke({ q: 'x' }, createTestInvocationContext());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('MCP_TOOL_EXECUTION_ERROR');
      expect(result.error.message).toBe('MCP tool "search_docs" on "docs" failed: index unavailable');
    }
  });

  it('keeps connection errors as they are', async () => {
    const lost = new MCPConnectionError('docs', 'Connection closed');
    const handle = createMCPToolHandle({
      serverName: 'docs',
      toolInfo: searchTool,
      connection: createMockConnection(() => Promise.reject(lost)),
    });

    const result = await handle.invoke({ q: 'x' }, createTestInvocationContext());

    expect(result).toEqual({ ok: false, error: lost });
  });

  it('wraps unexpected throws', async () => {
    const handle = createMCPToolHandle({
      serverName: 'docs',
      toolInfo: searchTool,
      connection: createMockConnection(() => Promise.reject(new Error('boom'))),
    });

    const result = await handle.invoke({ q: 'x' }, createTestInvocationContext());

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('MCP tool "search_docs" on "docs" failed: boom');
  });

  it('rejects non-object arguments', async () => {
    const connection = createMockConnection();
    const handle = createMCPToolHandle({ serverName: 'docs', toolInfo: searchTool, connection });

    const result = await handle.invoke('q=routing', createTestInvocationContext());

    expect(result.ok).toBe(false);
    expect(connection.callTool).not.toHaveBeenCalled();
  });
});

describe('extractText', () => {
  it('joins text items and skips others', () => {
    const result: MCPToolResult = {
      content: [
        { type: 'text', text: 'first' },
        { type: 'image', data: 'aGk=', mimeType: 'image/png' },
        { type: 'text', text: 'second' },
      ],
    };
    expect(extractText(result)).toBe('first\nsecond');
  });
});

describe('getMCPToolInputSchema', () => {
  it('substitutes an empty object schema', () => {
    expect(getMCPToolInputSchema({ ...searchTool, inputSchema: {} })).toEqual({ type: 'object', properties: {} });
  });

  it('adds a missing top-level type', () => {
    expect(getMCPToolInputSchema({ ...searchTool, inputSchema: { properties: { a: { type: 'string' } } } })).toEqual({
      type: 'object',
      properties: { a: { type: 'string' } },
    });
  });
});
