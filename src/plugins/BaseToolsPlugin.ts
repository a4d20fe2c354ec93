import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'winston';
import type { MCPPlugin, MCPServer, ToolCallContext, ToolHandler } from '../server/MCPServer.js';

export interface ToolLike {
  tool: Tool;
  execute(params: unknown, context: ToolCallContext): Promise<unknown>;
}

/**
 * Generic base plugin for tool plugins.
 * Subclasses create the tool instances and may override validation and per-tool
 * handler wrapping.
 */
export abstract class BaseToolsPlugin<TTool extends ToolLike> implements MCPPlugin {
  abstract name: string;
  abstract version: string;

  protected commands: TTool[] = [];
  protected logger?: Logger;
  protected commandMap: Map<string, TTool> = new Map();

  /** Create tool instances for this plugin */
  protected abstract createToolInstances(): TTool[];

  /** Optional: check external dependencies before registration */
  protected async validate(): Promise<void> {}

  /** Optional: custom wrapping for tool handlers */
  protected getHandlerForTool(command: TTool): ToolHandler {
    return (params, context) => command.execute(params, context);
  }

  /** Build the internal command map */
  protected buildCommandMap(): void {
    this.commandMap.clear();
    for (const command of this.commands) {
      this.commandMap.set(command.tool.name, command);
    }
  }

  async initialize(server: MCPServer): Promise<void> {
    this.logger = server.getLogger();

    try {
      await this.validate();

      this.commands = this.createToolInstances();
      this.buildCommandMap();

      for (const command of this.commands) {
        server.registerTool(command.tool, this.getHandlerForTool(command));
      }

      this.logger.info(`${this.constructor.name} initialized with ${this.commands.length} tools.`);
    } catch (error) {
      this.logger.error(`Failed to initialize ${this.constructor.name}`, { error });
      throw error;
    }
  }

  getToolFunction(toolName: string): ToolHandler | undefined {
    const command = this.commandMap.get(toolName);
    if (!command) return undefined;
    return this.getHandlerForTool(command);
  }

  async shutdown(): Promise<void> {}
}
