import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import winston from 'winston';
import { summarizeArguments } from '../utils/ArgumentSummary.js';
import { toMcpToolResult } from '../utils/McpToolResult.js';

export const SERVER_NAME = 'sandbox-exec-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Plugin interface for extending MCP server functionality
 */
export interface MCPPlugin {
  name: string;
  initialize(server: MCPServer): Promise<void>;
  shutdown?(): Promise<void>;
}

/**
 * Per-call facilities handed to tool handlers
 */
export interface ToolCallContext {
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
  /** Send a progress notification; a no-op unless the caller supplied a progress token */
  reportProgress(progress: number, message?: string): Promise<void>;
}

export type ToolHandler = (params: unknown, context: ToolCallContext) => Promise<unknown>;

/**
 * Tool registry entry
 */
interface ToolEntry {
  tool: Tool;
  handler: ToolHandler;
}

export interface MCPServerOptions {
  skipTransportErrorHandling?: boolean;
  skipGracefulShutdown?: boolean;
}

type Listener = (...args: unknown[]) => void;

interface ListenerTarget {
  on(event: string, listener: Listener): unknown;
  removeListener(event: string, listener: Listener): unknown;
}

const noProgress: ToolCallContext = {
  reportProgress: async () => undefined,
};

/**
 * MCP server exposing sandbox operations over stdio
 */
export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private logger: winston.Logger;
  private tools: Map<string, ToolEntry> = new Map();
  private plugins: Map<string, MCPPlugin> = new Map();
  private isShuttingDown = false;
  private options: MCPServerOptions;
  private eventListeners: Array<{
    target: ListenerTarget;
    event: string;
    handler: Listener;
  }> = [];

  constructor(options: MCPServerOptions = {}) {
    this.options = options;
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
        format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
      }),
    ];

    // Optional file logging controlled by env
    const isFileLogEnabled =
      process.env.MCP_LOG_ENABLE === 'true' || process.env.MCP_LOG_ENABLE === '1';
    if (isFileLogEnabled) {
      const logFilePath = process.env.MCP_LOG_FILE || `${SERVER_NAME}.log`;
      transports.push(
        new winston.transports.File({
          filename: logFilePath,
          format: winston.format.json(),
        }),
      );
    }

    this.logger = winston.createLogger({
      level: process.env.MCP_LOG_LEVEL || 'info',
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      transports,
    });

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    this.transport = new StdioServerTransport();

    // Skipped in tests
    if (!options.skipTransportErrorHandling) {
      this.setupTransportErrorHandling();
    }

    this.setupHandlers();

    // Skipped in tests to avoid process listeners
    if (!this.options.skipGracefulShutdown) {
      this.setupGracefulShutdown();
    }

    this.logger.info('MCPServer initialized');
  }

  /**
   * Add an event listener and track it for cleanup
   */
  private addTrackedListener(target: ListenerTarget, event: string, handler: Listener): void {
    target.on(event, handler);
    this.eventListeners.push({ target, event, handler });
  }

  /**
   * Remove all tracked event listeners
   */
  private removeAllListeners(): void {
    for (const { target, event, handler } of this.eventListeners) {
      target.removeListener(event, handler);
    }
    this.eventListeners = [];
  }

  /**
   * Stdio is the only channel to the client: errors are logged, and a closed stdin
   * means the client is gone, so the server shuts down.
   */
  private setupTransportErrorHandling(): void {
    this.addTrackedListener(process.stdin, 'error', (error) => {
      this.logger.error('Transport stdin error:', { error });
    });

    this.addTrackedListener(process.stdout, 'error', (error) => {
      this.logger.error('Transport stdout error:', { error });
    });

    this.addTrackedListener(process.stdin, 'close', () => {
      this.logger.warn('Transport stdin closed, shutting down');
      this.stop().catch((error: unknown) => {
        this.logger.error('Shutdown after stdin close failed', { error });
      });
    });
  }

  /**
   * Set up request handlers for MCP protocol
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.getTools();
      this.logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const toolEntry = this.tools.get(request.params.name);

      if (!toolEntry) {
        const error = `Tool not found: ${request.params.name}`;
        this.logger.error(error);
        throw new Error(error);
      }

      this.logger.info(`Executing tool: ${request.params.name}`, {
        arguments: summarizeArguments(request.params.arguments),
      });

      const progressToken = request.params._meta?.progressToken;
      const context: ToolCallContext = {
        signal: extra.signal,
        reportProgress: async (progress, message) => {
          if (progressToken === undefined) return;
          await extra.sendNotification({
            method: 'notifications/progress',
            params: { progressToken, progress, message },
          });
        },
      };

      try {
        const result = await toolEntry.handler(request.params.arguments ?? {}, context);
        return toMcpToolResult(result);
      } catch (error) {
        this.logger.error(`Tool execution failed: ${request.params.name}`, { error });
        throw error;
      }
    });
  }

  /**
   * Register a tool with the MCP server
   */
  public registerTool(tool: Tool, handler: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool already registered: ${tool.name}, overwriting`);
    }

    this.tools.set(tool.name, { tool, handler });
    this.logger.info(`Registered tool: ${tool.name}`);
  }

  /**
   * Get all registered tools
   */
  public getTools(): Tool[] {
    return Array.from(this.tools.values()).map((t) => t.tool);
  }

  /**
   * Execute a tool directly, outside a client request
   */
  public async executeTool(
    toolName: string,
    params: unknown,
    context: ToolCallContext = noProgress,
  ): Promise<CallToolResult> {
    const toolEntry = this.tools.get(toolName);
    if (!toolEntry) {
      throw new Error(`Tool not found: ${toolName}`);
    }
    return toMcpToolResult(await toolEntry.handler(params, context));
  }

  /**
   * Load and initialize a plugin
   */
  public async loadPlugin(plugin: MCPPlugin): Promise<void> {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin already loaded: ${plugin.name}`);
    }

    this.logger.info(`Loading plugin: ${plugin.name}`);

    try {
      await plugin.initialize(this);
      this.plugins.set(plugin.name, plugin);
      this.logger.info(`Plugin loaded successfully: ${plugin.name}`);
    } catch (error) {
      this.logger.error(`Failed to load plugin: ${plugin.name}`, { error });
      throw error;
    }
  }

  /**
   * Start the MCP server
   */
  public async start(): Promise<void> {
    this.logger.info('Starting MCP server...');

    try {
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', { error });
      throw error;
    }
  }

  /**
   * Stop the MCP server
   */
  public async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Stopping MCP server...');

    this.removeAllListeners();

    for (const [name, plugin] of this.plugins) {
      if (plugin.shutdown) {
        try {
          await plugin.shutdown();
          this.logger.info(`Plugin shutdown complete: ${name}`);
        } catch (error) {
          this.logger.error(`Plugin shutdown failed: ${name}`, { error });
        }
      }
    }

    await this.server.close();
    this.logger.info('MCP server stopped');
  }

  /**
   * Set up graceful shutdown handling
   */
  private setupGracefulShutdown(): void {
    const shutdown = (signal: string, exitCode: number) => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      this.stop()
        .catch((error: unknown) => {
          this.logger.error('Graceful shutdown failed', { error });
        })
        .finally(() => process.exit(exitCode));
    };

    this.addTrackedListener(process, 'SIGINT', () => shutdown('SIGINT', 0));
    this.addTrackedListener(process, 'SIGTERM', () => shutdown('SIGTERM', 0));

    this.addTrackedListener(process, 'uncaughtException', (error) => {
      this.logger.error('Uncaught exception:', { error });
      shutdown('uncaughtException', 1);
    });

    this.addTrackedListener(process, 'unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection:', { reason });
      shutdown('unhandledRejection', 1);
    });
  }

  /**
   * Get the logger instance
   */
  public getLogger(): winston.Logger {
    return this.logger;
  }

  /**
   * Get the underlying MCP server instance
   */
  public getServer(): Server {
    return this.server;
  }

  /**
   * Clean up resources and event listeners (useful for tests)
   */
  public cleanup(): void {
    this.removeAllListeners();
  }
}
