import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CancelRequestSchema, parseRequest } from '../../sandbox/RequestSchemas.js';
import { SandboxCommonSchemas, type SandboxBaseTool, type SandboxToolOptions } from './BaseTool.js';

/**
 * Stop the run or install in progress
 */
export class CancelTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_cancel',
    description: 'Stop the code run or package install currently in progress in the sandbox.',
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
    const { userId } = parseRequest(CancelRequestSchema, params);
    return this.options.service.cancel(userId);
  }
}
