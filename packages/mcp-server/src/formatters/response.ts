import { ZodError } from "zod";
import { isValuationError } from "@ip-valuation/engine";

// Identifier fields keep their text even when it looks numeric (e.g. asset id "001")
const STRING_FIELDS = new Set(["ticker", "segment", "id", "kind", "description", "method", "mode"]);

/**
 * Recursively coerce string values that look like numbers into actual numbers.
 * The MCP SDK sometimes passes numeric arguments as strings.
 */
export function coerceNumbers(obj: unknown, key?: string): unknown {
  if (typeof obj === "string") {
    if (key !== undefined && STRING_FIELDS.has(key)) return obj;
    if (obj === "" || obj === "true" || obj === "false" || obj === "null") return obj;
    const n = Number(obj);
    if (!isNaN(n) && obj.trim() !== "") return n;
    return obj;
  }
  if (Array.isArray(obj)) return obj.map(item => coerceNumbers(item, key));
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = coerceNumbers(v, k);
    }
    return result;
  }
  return obj;
}

export function wrapResponse(result: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

export interface ToolErrorBody {
  error: string;
  kind: string;
  details?: Record<string, unknown>;
}

export function toErrorBody(err: unknown): ToolErrorBody {
  if (isValuationError(err)) {
    return { error: err.message, kind: err.kind, details: err.details };
  }
  if (err instanceof ZodError) {
    return {
      error: "Invalid tool input",
      kind: "InvalidInput",
      details: { issues: err.issues.map(i => ({ path: i.path.join("."), message: i.message })) },
    };
  }
  if (err instanceof Error) return { error: err.message, kind: "InternalError" };
  return { error: String(err), kind: "InternalError" };
}

export function errorResponse(err: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(toErrorBody(err)) }],
    isError: true,
  };
}

/**
 * Run a tool body and wrap its result. Failures become an error result for the client
 * and one line on stderr; stdout carries the protocol.
 */
export async function runTool(name: string, body: () => unknown) {
  try {
    return wrapResponse(await body());
  } catch (err) {
    const { kind, error } = toErrorBody(err);
    console.error(`[${name}] ${kind}: ${error}`);
    return errorResponse(err);
  }
}
