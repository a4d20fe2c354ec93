import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { parseRequest, RemoveRequestSchema } from '../../sandbox/RequestSchemas.js';
import { SandboxCommonSchemas, type SandboxBaseTool, type SandboxToolOptions } from './BaseTool.js';

/**
 * Remove a file, link or directory
 */
export class RemoveEntryTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_remove',
    description:
      'Remove a file or directory from the sandbox. A non-empty directory is only ' +
      'removed with recursive=true. Symbolic links are removed, not followed.',
    inputSchema: {
      type: 'object',
      properties: {
        userId: SandboxCommonSchemas.userId,
        path: {
          ...SandboxCommonSchemas.path,
          description: 'Entry path relative to the sandbox root',
        },
        recursive: {
          type: 'boolean',
          description: 'Remove directories with all their contents',
          default: false,
        },
      },
      required: ['userId', 'path'],
    },
  };

  constructor(private readonly options: SandboxToolOptions) {}

  async execute(params: unknown) {
    const request = parseRequest(RemoveRequestSchema, params);
    return this.options.service.removeEntry(request.userId, request.path, request.recursive);
  }
}
