/**
 * Provider factory.
 * Resolves an LLMProviderConfig into a concrete LLMProvider instance,
 * reading API keys from the environment.
 */
import type { LLMProviderConfig } from '@/core/types.js';
import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { createAnthropicProvider } from './anthropic.js';
import { createOpenAIProvider } from './openai.js';
import type { LLMProvider } from './types.js';

const logger = createLogger({ name: 'provider-factory' });

const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
const OLLAMA_BASE_URL = 'http://localhost:11434/v1';

const DEFAULT_KEY_ENV_VARS: Record<LLMProviderConfig['provider'], string | undefined> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  groq: 'GROQ_API_KEY',
  ollama: undefined,
};

/**
 * Resolve an API key from an environment variable name.
 * Never logs or returns the actual key value, only whether it was found.
 */
function resolveApiKey(config: LLMProviderConfig): string {
  const envVar = config.apiKeyEnvVar ?? DEFAULT_KEY_ENV_VARS[config.provider];
  if (!envVar) {
    throw new ProviderError(config.provider, 'No apiKeyEnvVar configured');
  }
  const key = process.env[envVar];
  if (!key) {
    throw new ProviderError(config.provider, `Environment variable "${envVar}" is not set or empty`);
  }
  return key;
}

/** Create an LLMProvider from a configuration object. */
export function createProvider(config: LLMProviderConfig): LLMProvider {
  logger.info('Creating LLM provider', {
    component: 'provider-factory',
    provider: config.provider,
    model: config.model,
  });

  switch (config.provider) {
    case 'anthropic':
      return createAnthropicProvider({
        apiKey: resolveApiKey(config),
        model: config.model,
        baseUrl: config.baseUrl,
      });

    case 'openai':
      return createOpenAIProvider({
        apiKey: resolveApiKey(config),
        model: config.model,
        baseUrl: config.baseUrl,
        providerLabel: 'openai',
      });

    case 'groq':
      return createOpenAIProvider({
        apiKey: resolveApiKey(config),
        model: config.model,
        baseUrl: config.baseUrl ?? GROQ_BASE_URL,
        providerLabel: 'groq',
      });

    case 'ollama':
      // Ollama ignores the key but the OpenAI client requires one
      return createOpenAIProvider({
        apiKey: config.apiKeyEnvVar ? resolveApiKey(config) : 'ollama',
        model: config.model,
        baseUrl: config.baseUrl ?? OLLAMA_BASE_URL,
        providerLabel: 'ollama',
      });

    default: {
      const _exhaustive: never = config.provider;
      throw new ProviderError(String(_exhaustive), `Unknown provider: ${String(_exhaustive)}`);
    }
  }
}
