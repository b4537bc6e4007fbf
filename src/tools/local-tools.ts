import type { ToolsConfig } from '@/config/schema.js';
import {
  createGitHubTools,
  createListFilesTool,
  createReadFileTool,
  createWebSearchTool,
  createWriteFileTool,
} from './definitions/index.js';
import type { ToolHandle } from './types.js';

/**
 * Build every in-process tool from the tools config section.
 * Secrets are looked up in `env` by the variable names the config gives.
 */
export function createLocalTools(
  config: ToolsConfig,
  env: NodeJS.ProcessEnv = process.env,
): ToolHandle[] {
  const { workspaceDir } = config;
  return [
    createReadFileTool({ workspaceDir }),
    createWriteFileTool({ workspaceDir }),
    createListFilesTool({ workspaceDir }),
    createWebSearchTool({ apiKey: env[config.webSearch.apiKeyEnvVar] }),
    ...createGitHubTools({
      token: env[config.github.tokenEnvVar],
      baseUrl: config.github.baseUrl,
    }),
  ];
}
