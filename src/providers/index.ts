// LLM provider adapters (openai, anthropic, groq, ollama)
export type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  MessageContent,
  MessageRole,
  StopReason,
  TextContent,
  TokenUsage,
  ToolDefinitionForProvider,
  ToolResultContent,
  ToolUseContent,
} from './types.js';

export { createProvider } from './factory.js';
export { createAnthropicProvider } from './anthropic.js';
export type { AnthropicProviderOptions } from './anthropic.js';
export { createOpenAIProvider } from './openai.js';
export type { OpenAIProviderOptions } from './openai.js';
export { getModelMeta } from './models.js';
export type { ModelMeta } from './models.js';
