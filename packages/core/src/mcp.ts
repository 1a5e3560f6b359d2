/**
 * Agent-facing tool payloads.
 * Both transports send exactly this shape, so a tool's output is encoded once.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export interface TextContent {
  type: "text";
  text: string;
}

/**
 * Outcome of a tool call as the agent sees it.
 * `isError` is always present so HTTP and stdio bodies stay identical.
 */
export interface ToolPayload {
  [key: string]: unknown;
  content: TextContent[];
  isError: boolean;
}

export function textPayload(text: string): ToolPayload {
  return { content: [{ type: "text", text }], isError: false };
}

export function errorPayload(message: string): ToolPayload {
  return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
}

/**
 * Encode a tool's Result. Errors are prefixed with `Error: `.
 */
export function resultToPayload<E extends string | Error>(result: Result<string, E>): ToolPayload {
  if (result.ok) {
    return textPayload(result.value);
  }
  const message = result.error instanceof Error ? result.error.message : String(result.error);
  return errorPayload(message);
}
