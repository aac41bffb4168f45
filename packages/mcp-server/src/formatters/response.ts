import { ConfigurationError, errorMessage } from "@stockdesk/agents";

/**
 * Recursively coerce string values that look like numbers into actual numbers.
 * Some MCP clients pass numeric arguments as strings.
 */
export function coerceNumbers(obj: unknown): unknown {
  if (typeof obj === "string") {
    if (obj === "" || obj === "true" || obj === "false" || obj === "null") return obj;
    const n = Number(obj);
    if (!Number.isNaN(n) && obj.trim() !== "") return n;
    return obj;
  }
  if (Array.isArray(obj)) return obj.map(coerceNumbers);
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = coerceNumbers(v);
    }
    return result;
  }
  return obj;
}

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function errorBody(err: Error): Record<string, unknown> {
  if (err instanceof ConfigurationError) return { error: err.message, issues: err.issues };
  return { error: err.message };
}

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text", text: JSON.stringify(errorBody(result)) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
}

/** Run a handler and wrap its result; a thrown error becomes an isError response */
export async function respond(handler: () => unknown): Promise<ToolResponse> {
  try {
    return wrapResponse(await handler());
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(errorMessage(err)));
  }
}
