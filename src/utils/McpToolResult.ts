import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export function isMcpToolResult(value: unknown): value is CallToolResult {
  if (!value || typeof value !== 'object' || !('content' in value)) return false;
  return CallToolResultSchema.safeParse(value).success;
}

export function toMcpToolResult(value: unknown): CallToolResult {
  if (isMcpToolResult(value)) return value;
  const text =
    typeof value === 'string'
      ? value
      : value === undefined
        ? 'undefined'
        : JSON.stringify(value, null, 2);
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

/** Rejected tool call carrying a structured error body */
export function toMcpErrorResult(error: object): CallToolResult {
  return {
    isError: true,
    content: [
      {
        type: 'text',
        text: JSON.stringify({ error }, null, 2),
      },
    ],
  };
}
