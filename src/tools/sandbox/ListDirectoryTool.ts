import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ListRequestSchema, parseRequest } from '../../sandbox/RequestSchemas.js';
import { SandboxCommonSchemas, type SandboxBaseTool, type SandboxToolOptions } from './BaseTool.js';

/**
 * List one page of a sandbox directory
 */
export class ListDirectoryTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_list',
    description:
      'List a directory inside the sandbox one page at a time, directories first. ' +
      'File sizes are in bytes.',
    inputSchema: {
      type: 'object',
      properties: {
        userId: SandboxCommonSchemas.userId,
        path: SandboxCommonSchemas.path,
        page: {
          type: 'integer',
          description: 'Page number starting at 1',
          minimum: 1,
          default: 1,
        },
      },
      required: ['userId'],
    },
  };

  constructor(private readonly options: SandboxToolOptions) {}

  async execute(params: unknown) {
    const request = parseRequest(ListRequestSchema, params);
    return this.options.service.listDirectory(request.userId, request.path, request.page);
  }
}
