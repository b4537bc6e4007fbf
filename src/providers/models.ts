/**
 * Model metadata registry.
 * Maps model identifiers to their capabilities.
 */

export interface ModelMeta {
  /** Context window size in tokens. */
  contextWindow: number;
  /** Maximum output tokens supported. */
  maxOutputTokens: number;
  /** Whether the model supports tool/function calling. */
  supportsTools: boolean;
}

const MODEL_REGISTRY: Record<string, ModelMeta> = {
  // ─── Groq ───────────────────────────────────────────────────
  'llama3-8b-8192': { contextWindow: 8_192, maxOutputTokens: 8_192, supportsTools: true },
  'llama3-70b-8192': { contextWindow: 8_192, maxOutputTokens: 8_192, supportsTools: true },
  'llama-3.1-8b-instant': { contextWindow: 131_072, maxOutputTokens: 8_192, supportsTools: true },
  'llama-3.3-70b-versatile': { contextWindow: 131_072, maxOutputTokens: 32_768, supportsTools: true },
  'mixtral-8x7b-32768': { contextWindow: 32_768, maxOutputTokens: 32_768, supportsTools: true },

  // ─── OpenAI ─────────────────────────────────────────────────
  'gpt-4o': { contextWindow: 128_000, maxOutputTokens: 16_384, supportsTools: true },
  'gpt-4o-mini': { contextWindow: 128_000, maxOutputTokens: 16_384, supportsTools: true },

  // ─── Anthropic ──────────────────────────────────────────────
  'claude-3-5-sonnet-latest': { contextWindow: 200_000, maxOutputTokens: 8_192, supportsTools: true },
  'claude-3-5-haiku-latest': { contextWindow: 200_000, maxOutputTokens: 8_192, supportsTools: true },
};

/** Conservative defaults for models not in the registry. */
const DEFAULT_META: ModelMeta = {
  contextWindow: 8_192,
  maxOutputTokens: 4_096,
  supportsTools: true,
};

/**
 * Look up metadata for a model.
 * Returns conservative defaults for unrecognized models.
 */
export function getModelMeta(model: string): ModelMeta {
  return MODEL_REGISTRY[model] ?? DEFAULT_META;
}
