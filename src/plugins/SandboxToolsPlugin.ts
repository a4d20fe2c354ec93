import { describeError, SandboxError } from '../sandbox/ErrorHandling.js';
import type { ExpiryReaper } from '../sandbox/ExpiryReaper.js';
import type { MCPServer, ToolHandler } from '../server/MCPServer.js';
import {
  CancelTool,
  CreateSandboxTool,
  DeleteSandboxTool,
  HealthTool,
  InstallPackagesTool,
  ListDirectoryTool,
  RemoveEntryTool,
  RunCodeTool,
  SandboxInfoTool,
  type SandboxBaseTool,
  type SandboxToolOptions,
  WriteFileTool,
} from '../tools/sandbox/index.js';
import { toMcpErrorResult } from '../utils/McpToolResult.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

export interface SandboxToolsPluginOptions extends SandboxToolOptions {
  /** Started once the tools are registered, stopped on shutdown */
  reaper?: ExpiryReaper;
}

/**
 * Plugin that registers sandbox tools with the MCP server
 */
export class SandboxToolsPlugin extends BaseToolsPlugin<SandboxBaseTool> {
  name = 'sandbox-tools';
  version = '0.1.0';

  constructor(private readonly options: SandboxToolsPluginOptions) {
    super();
  }

  protected createToolInstances(): SandboxBaseTool[] {
    return [
      new CreateSandboxTool(this.options),
      new SandboxInfoTool(this.options),
      new RunCodeTool(this.options),
      new ListDirectoryTool(this.options),
      new WriteFileTool(this.options),
      new RemoveEntryTool(this.options),
      new InstallPackagesTool(this.options),
      new DeleteSandboxTool(this.options),
      new CancelTool(this.options),
      new HealthTool(this.options),
    ];
  }

  /** Load persisted sandboxes and pre-pull the image before tools are offered */
  protected async validate(): Promise<void> {
    await this.options.service.prepare();
  }

  /**
   * Sandbox errors become rejected tool results the client can read; anything else is
   * a server fault and propagates.
   */
  protected getHandlerForTool(command: SandboxBaseTool): ToolHandler {
    return async (params, context) => {
      try {
        return await command.execute(params, context);
      } catch (error) {
        if (!(error instanceof SandboxError)) {
          throw error;
        }
        this.logger?.warn(`${command.tool.name} rejected: ${error.message}`, { code: error.code });
        return toMcpErrorResult(describeError(error));
      }
    };
  }

  async initialize(server: MCPServer): Promise<void> {
    await super.initialize(server);
    this.options.reaper?.start();
  }

  async shutdown(): Promise<void> {
    this.options.service.shutdown();
    await this.options.reaper?.stop();
  }
}
