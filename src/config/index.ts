// ─── Schemas ────────────────────────────────────────────────────
export {
  agentDefinitionSchema,
  conclaveConfigSchema,
  coordinatorConfigSchema,
  handoffRuleSchema,
  llmProviderConfigSchema,
  mcpServerConfigSchema,
  routingPolicySchema,
  serverConfigSchema,
  storageConfigSchema,
  teamConfigSchema,
  toolsConfigSchema,
} from './schema.js';
export type {
  AgentDefinitionConfig,
  ConclaveConfig,
  ConclaveConfigInput,
  MCPServerConfigEntry,
  TeamConfig,
  ToolsConfig,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, DEFAULT_CONFIG_PATH, loadConfig, parseConfig, resolveEnvVars } from './loader.js';
