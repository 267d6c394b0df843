import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../domain/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("mcp");

export function jsonText(payload: unknown): string {
  return JSON.stringify(payload, null, 2);
}

export function jsonResult(payload: Record<string, unknown>, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: "text", text: jsonText(payload) }],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/**
 * Runs a tool body and reports `{ success: true, ... }`, or
 * `{ success: false, error }` with `isError` set when it throws.
 */
export async function runTool(
  toolName: string,
  action: () => Promise<Record<string, unknown>>,
): Promise<CallToolResult> {
  try {
    return jsonResult({ success: true, ...(await action()) });
  } catch (error) {
    logger.error(`${toolName} failed: ${describeError(error)}`);
    return jsonResult({ success: false, error: describeError(error) }, true);
  }
}
