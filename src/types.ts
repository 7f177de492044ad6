/**
 * Tool contract types for the KYC intake MCP server.
 * Every tool registered on this server returns a payload that extends ToolOutput.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "./errors.js";

// ---------------------------------------------------------------------------
// Core contract
// ---------------------------------------------------------------------------

export interface ToolOutput {
  /** True when a dealing representative should follow up before the form is filed. */
  flagForReview: boolean;
  /** Why the output was flagged, if applicable. */
  flagReason?: string;
}

// ---------------------------------------------------------------------------
// Helpers: serialise payloads for MCP content responses
// ---------------------------------------------------------------------------

export function toToolText<T extends ToolOutput>(payload: T): string {
  return JSON.stringify(payload);
}

export function toToolResult<T extends ToolOutput>(payload: T): CallToolResult {
  return { content: [{ type: "text", text: toToolText(payload) }] };
}

export function toToolError(err: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: errorMessage(err) }) }],
    isError: true,
  };
}
