/**
 * Configuration loader: reads the JSON config file, resolves `${VAR}`
 * placeholders from the environment and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { ConclaveError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { ConclaveConfig } from './schema.js';
import { conclaveConfigSchema } from './schema.js';

/** Default config file name, looked up in the working directory. */
export const DEFAULT_CONFIG_PATH = 'conclave.config.json';

// ─── Errors ─────────────────────────────────────────────────────

export class ConfigError extends ConclaveError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)\}/g;

/**
 * Recursively replaces `${VAR_NAME}` placeholders inside strings with the
 * value of the environment variable. Placeholders may be embedded in longer
 * strings ("http://${HOST}:8080").
 *
 * @throws ConfigError if a referenced variable is not defined
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(ENV_VAR_PATTERN, (placeholder, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: placeholder,
        });
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  return obj;
}

// ─── Validation ─────────────────────────────────────────────────

/** Validate an already-parsed config object. */
export function parseConfig(
  raw: unknown,
  source = '<inline>',
): Result<ConclaveConfig, ConfigError> {
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(raw);
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    return err(
      new ConfigError('Failed to resolve environment variables', {
        source,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const validation = conclaveConfigSchema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { source, issues }));
  }

  return ok(validation.data);
}

// ─── Loader ─────────────────────────────────────────────────────

/**
 * Load and validate the config file at `filePath`.
 * Read and parse failures are reported as ConfigError, never thrown.
 */
export async function loadConfig(
  filePath: string = process.env['CONCLAVE_CONFIG'] ?? DEFAULT_CONFIG_PATH,
): Promise<Result<ConclaveConfig, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (error) {
    return err(
      new ConfigError('Invalid JSON in configuration file', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  return parseConfig(parsed, filePath);
}
