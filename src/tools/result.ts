/**
 * MCP tool result helpers.
 */

import { describeError } from "../errors.js";
import { LogLevel, shouldLog } from "../logger.js";

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

/**
 * Run a tool body and wrap its text, or the error it throws, as a tool result.
 * Errors never escape: the client sees `isError` and the error kind.
 */
export function toolResult(tool: string, run: () => string): ToolResult {
  try {
    return { content: [{ type: "text", text: run() }] };
  } catch (err) {
    const text = describeError(err);
    shouldLog(LogLevel.Warning) && console.error(`${tool} failed: ${text}`);
    return { content: [{ type: "text", text: `Error: ${text}` }], isError: true };
  }
}
