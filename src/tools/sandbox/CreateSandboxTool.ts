import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CreateRequestSchema, parseRequest } from '../../sandbox/RequestSchemas.js';
import {
  describeSandbox,
  SandboxCommonSchemas,
  type SandboxBaseTool,
  type SandboxToolOptions,
} from './BaseTool.js';

/**
 * Create an empty sandbox for a user
 */
export class CreateSandboxTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_create',
    description:
      'Create a private sandbox directory for a user. Fails if the user already has one.',
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
    const { userId } = parseRequest(CreateRequestSchema, params);
    const record = this.options.service.create(userId);
    return describeSandbox(record, this.options.retentionSeconds);
  }
}
