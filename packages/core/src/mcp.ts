/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for creating consistent tool responses.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response structure.
 * A type alias (not an interface) so it stays assignable to the SDK's open result type.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

/**
 * A failure that carries a machine-readable code next to its message.
 */
export interface ToolFailure {
  code: string;
  message: string;
}

export type ErrorContent = { success: false; error: string; code?: string };

function describeFailure(error: string | Error | ToolFailure): { message: string; code?: string } {
  if (typeof error === "string") return { message: error };
  if (error instanceof Error) return { message: error.message };
  return { message: error.message, code: error.code };
}

/**
 * Create an error response from a message, an Error or a coded failure.
 */
export function errorResponse(error: string | Error | ToolFailure): ToolResponse<ErrorContent> {
  const { message, code } = describeFailure(error);
  const text = code ? `Error (${code}): ${message}` : `Error: ${message}`;
  return {
    content: [{ type: "text", text }],
    structuredContent: code ? { success: false, error: message, code } : { success: false, error: message },
    isError: true,
  };
}

/**
 * Create a success response with text and optional structured content.
 */
export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result to an MCP tool response with structured data.
 * On success, calls the formatter to generate text and structured content.
 * On error, returns an error response.
 */
export function resultToStructuredResponse<T, E extends string | Error | ToolFailure, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ErrorContent> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return successResponse(text, data);
  }
  return errorResponse(result.error);
}
