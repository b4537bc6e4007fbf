import type { z } from 'zod';
import type { Result } from '@/core/result.js';
import { err } from '@/core/result.js';
import type { ConclaveError } from '@/core/errors.js';
import { ToolValidationError } from '@/core/errors.js';
import type { ToolHandle, ToolInvocationContext } from './types.js';

export interface LocalToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: S;
  run(input: z.output<S>, context: ToolInvocationContext): Promise<Result<unknown, ConclaveError>>;
}

/**
 * Build a ToolHandle for an in-process handler.
 * The handler receives input typed from its schema.
 */
export function defineLocalTool<S extends z.ZodTypeAny>(definition: LocalToolDefinition<S>): ToolHandle {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    provider: { kind: 'local' },

    invoke(input, context) {
      const parsed = definition.inputSchema.safeParse(input);
      if (!parsed.success) {
        return Promise.resolve(
          err(
            new ToolValidationError(
              definition.name,
              parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
            ),
          ),
        );
      }
      return definition.run(parsed.data, context);
    },
  };
}
