/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response structure.
 * The index signature keeps it assignable to the SDK's CallToolResult.
 */
export type ToolResponse<T = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
};

export interface ToolFailure extends Record<string, unknown> {
  success: false;
  error: string;
}

/**
 * Create a simple text response.
 */
export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Create an error response from a message or Error.
 */
export function errorResponse(error: string | Error): ToolResponse<ToolFailure> {
  const message = error instanceof Error ? error.message : error;
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
  };
}

/**
 * Convert a Result into a tool response with structured data.
 * On error, returns an error response.
 */
export function resultToStructuredResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ToolFailure> {
  if (!result.ok) {
    return errorResponse(result.error);
  }
  const { text, data } = formatter(result.value);
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}
