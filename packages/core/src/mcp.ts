/**
 * MCP response helpers.
 * Every termdesk tool answers with a text block for people and
 * structuredContent (always carrying `success`) for clients that render forms.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
};

export type Failure = { success: false; error: string };

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

export function errorResponse(message: string): ToolResponse<Failure> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true as const },
  };
}

/**
 * Render an Ok through `formatter`; an Err becomes an error response.
 */
export function resultToResponse<T, S extends Record<string, unknown>>(
  result: Result<T, string>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | Failure> {
  if (!result.ok) {
    return errorResponse(result.error);
  }
  const { text, data } = formatter(result.value);
  return successResponse(text, data);
}
