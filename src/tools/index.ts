// Tool system: handles, registry, gateway, local definitions
export type { ToolCatalogEntry, ToolHandle, ToolInvocationContext, ToolProviderRef } from './types.js';
export { defineLocalTool } from './define-tool.js';
export type { LocalToolDefinition } from './define-tool.js';

export { createToolRegistry, toOpenAICompatibleSchema } from './registry/tool-registry.js';
export type { ToolRegistry } from './registry/tool-registry.js';
export { createToolGateway, normalizeToolError } from './gateway/tool-gateway.js';
export type { InvokeOptions, ToolGateway, ToolGatewayOptions } from './gateway/tool-gateway.js';

export { createLocalTools } from './local-tools.js';
