import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { parseRequest, RunParamsSchema } from '../../sandbox/RequestSchemas.js';
import type { ToolCallContext } from '../../server/MCPServer.js';
import { SandboxCommonSchemas, type SandboxBaseTool, type SandboxToolOptions } from './BaseTool.js';

/**
 * Run Python code in an isolated, network-less container over the user's sandbox
 */
export class RunCodeTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_run',
    description:
      'Run Python code in an isolated container with the sandbox mounted as the working ' +
      'directory. No network access; CPU, memory, process and time limits apply. ' +
      'Markdown code fences around the code are removed.',
    inputSchema: {
      type: 'object',
      properties: {
        userId: SandboxCommonSchemas.userId,
        code: {
          type: 'string',
          description: 'Python source, read from stdin by the interpreter',
        },
        workdir: {
          ...SandboxCommonSchemas.path,
          description: 'Working directory relative to the sandbox root (defaults to the root)',
        },
      },
      required: ['userId', 'code'],
    },
  };

  constructor(private readonly options: SandboxToolOptions) {}

  async execute(params: unknown, context: ToolCallContext): Promise<CallToolResult> {
    const request = parseRequest(RunParamsSchema, params);
    const { result, output } = await this.options.service.run(
      request.userId,
      request.code,
      request.workdir,
      context.signal,
    );

    const summary = `status: ${result.status}, exit code: ${result.exitCode}, ${result.durationMs}ms`;

    if (output.kind === 'inline') {
      return {
        content: [
          { type: 'text', text: output.text },
          { type: 'text', text: summary },
        ],
      };
    }

    return {
      content: [
        { type: 'text', text: output.preview },
        { type: 'text', text: `${output.note}\n${summary}` },
        {
          type: 'resource',
          resource: {
            uri: `sandbox://${request.userId}/${output.filename}`,
            mimeType: 'text/plain',
            text: output.attachment.toString('utf-8'),
          },
        },
      ],
    };
  }
}
