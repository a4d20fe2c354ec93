import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { InfoRequestSchema, parseRequest } from '../../sandbox/RequestSchemas.js';
import {
  describeSandbox,
  SandboxCommonSchemas,
  type SandboxBaseTool,
  type SandboxToolOptions,
} from './BaseTool.js';

/**
 * Show a sandbox's activity, expiry and approximate size
 */
export class SandboxInfoTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_info',
    description:
      'Show when a sandbox was created and last used, when it expires, and its approximate size.',
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
    const { userId } = parseRequest(InfoRequestSchema, params);
    const record = this.options.service.getSandbox(userId);
    return describeSandbox(record, this.options.retentionSeconds);
  }
}
