import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { InstallRequestSchema, parseRequest } from '../../sandbox/RequestSchemas.js';
import type { InstallResult } from '../../sandbox/types.js';
import type { ToolCallContext } from '../../server/MCPServer.js';
import { SandboxCommonSchemas, type SandboxBaseTool, type SandboxToolOptions } from './BaseTool.js';

/**
 * Install Python packages into the sandbox's package directory
 */
export class InstallPackagesTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_install',
    description:
      'Install Python packages with pip into the sandbox so later runs can import them. ' +
      'Progress notifications carry the tail of the install log.',
    inputSchema: {
      type: 'object',
      properties: {
        userId: SandboxCommonSchemas.userId,
        packages: {
          type: 'array',
          items: { type: 'string' },
          description: 'Requirement specifiers such as "requests" or "numpy==1.26.4"',
          minItems: 1,
          maxItems: 20,
        },
      },
      required: ['userId', 'packages'],
    },
  };

  constructor(private readonly options: SandboxToolOptions) {}

  async execute(params: unknown, context: ToolCallContext) {
    const request = parseRequest(InstallRequestSchema, params);
    const { service, installLogTail } = this.options;

    let updates = 0;
    let result: InstallResult | undefined;
    for await (const event of service.installPackages(
      request.userId,
      request.packages,
      context.signal,
    )) {
      if (event.type === 'progress') {
        updates++;
        await context.reportProgress(updates, event.log);
      } else {
        result = event.result;
      }
    }

    if (!result) {
      throw new Error('Install ended without a result');
    }

    return {
      success: result.success,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      cancelled: result.cancelled,
      packages: result.packages,
      durationMs: result.durationMs,
      log: service.formatter.tail(result.finalLog, installLogTail),
    };
  }
}
