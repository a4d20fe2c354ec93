import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { parseRequest, WriteRequestSchema } from '../../sandbox/RequestSchemas.js';
import { SandboxCommonSchemas, type SandboxBaseTool, type SandboxToolOptions } from './BaseTool.js';

/**
 * Create or overwrite a text file
 */
export class WriteFileTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_write',
    description:
      'Create or overwrite a UTF-8 text file in the sandbox. Missing parent directories ' +
      'are created.',
    inputSchema: {
      type: 'object',
      properties: {
        userId: SandboxCommonSchemas.userId,
        path: {
          ...SandboxCommonSchemas.path,
          description: 'File path relative to the sandbox root',
        },
        content: {
          type: 'string',
          description: 'File content, at most 1 MiB',
        },
      },
      required: ['userId', 'path', 'content'],
    },
  };

  constructor(private readonly options: SandboxToolOptions) {}

  async execute(params: unknown) {
    const request = parseRequest(WriteRequestSchema, params);
    return this.options.service.writeFile(request.userId, request.path, request.content);
  }
}
