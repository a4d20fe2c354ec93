import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { DeleteRequestSchema, parseRequest } from '../../sandbox/RequestSchemas.js';
import { SandboxCommonSchemas, type SandboxBaseTool, type SandboxToolOptions } from './BaseTool.js';

/**
 * Delete a sandbox and everything in it
 */
export class DeleteSandboxTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_delete',
    description: 'Delete the sandbox and all of its files. Fails while code is running in it.',
    inputSchema: {
      type: 'object',
      properties: {
        userId: SandboxCommonSchemas.userId,
      },
      required: ['userId'],
    },
  };

  constructor(private readonly options: SandboxToolOptions) {}

  async execute(params: unknown) {
    const { userId } = parseRequest(DeleteRequestSchema, params);
    await this.options.service.deleteSandbox(userId);
    return { userId, deleted: true };
  }
}
