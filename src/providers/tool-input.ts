/** Parse streamed tool-call argument JSON. Empty input means "no arguments". */
export function parseToolInput(json: string): {
  input: Record<string, unknown>;
  inputError?: string;
} {
  if (json.trim() === '') return { input: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      input: {},
      inputError: `arguments are not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    };
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { input: {}, inputError: 'arguments must be a JSON object' };
  }
  return { input: Object.fromEntries(Object.entries(parsed)) };
}
