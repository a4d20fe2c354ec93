import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { SandboxService } from '../../sandbox/SandboxService.js';
import type { SandboxRecord } from '../../sandbox/types.js';
import type { ToolCallContext } from '../../server/MCPServer.js';

/**
 * Base interface for all sandbox MCP tool commands
 */
export interface SandboxBaseTool {
  /**
   * The tool definition for MCP registration
   */
  tool: Tool;

  /**
   * Execute the command with unvalidated parameters from the client
   */
  execute(params: unknown, context: ToolCallContext): Promise<unknown>;
}

export interface SandboxToolOptions {
  service: SandboxService;
  retentionSeconds: number;
  /** Characters of install log shown with progress and results */
  installLogTail: number;
}

/**
 * Common parameter schemas used across multiple sandbox commands
 */
export const SandboxCommonSchemas = {
  userId: {
    type: 'string',
    description: 'Owner of the sandbox: 1-64 letters, digits, "_" or "-"',
    pattern: '^[A-Za-z0-9_-]{1,64}$',
  },
  path: {
    type: 'string',
    description: 'Path relative to the sandbox root (empty for the root)',
  },
};

/**
 * Client-facing view of a sandbox record. Host paths are not exposed.
 */
export function describeSandbox(record: SandboxRecord, retentionSeconds: number) {
  return {
    userId: record.userId,
    createdAt: new Date(record.createdAt).toISOString(),
    lastActivityAt: new Date(record.lastActivityAt).toISOString(),
    expiresAt: new Date(record.lastActivityAt + retentionSeconds * 1000).toISOString(),
    sizeBytes: record.sizeBytes,
  };
}
