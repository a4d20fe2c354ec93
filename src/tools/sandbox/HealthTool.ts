import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { SandboxBaseTool, SandboxToolOptions } from './BaseTool.js';

/**
 * Report whether the container runtime and execution image are available
 */
export class HealthTool implements SandboxBaseTool {
  tool: Tool = {
    name: 'sandbox_health',
    description: 'Check that Docker is reachable and the execution image is present.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  };

  constructor(private readonly options: SandboxToolOptions) {}

  async execute() {
    return this.options.service.healthCheck();
  }
}
