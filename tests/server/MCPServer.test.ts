import { jest } from '@jest/globals';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { MCPServer, type MCPPlugin, type ToolHandler } from '../../src/server/MCPServer.js';

// Mock winston to avoid file system operations in tests
jest.mock('winston', () => {
  const mockLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  };

  return {
    createLogger: jest.fn(() => mockLogger),
    format: {
      combine: jest.fn(),
      timestamp: jest.fn(),
      json: jest.fn(),
      colorize: jest.fn(),
      simple: jest.fn(),
    },
    transports: {
      Console: jest.fn(),
      File: jest.fn(),
    },
  };
});

// Mock the MCP SDK
jest.mock('@modelcontextprotocol/sdk/server/index.js', () => ({
  Server: jest.fn().mockImplementation(() => ({
    setRequestHandler: jest.fn(),
    connect: jest.fn(),
    close: jest.fn(),
  })),
}));

jest.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: jest.fn(),
}));

type RequestHandler = (request: unknown, extra: unknown) => Promise<unknown>;

const echoTool: Tool = {
  name: 'echo',
  description: 'Echo the arguments',
  inputSchema: {
    type: 'object',
    properties: {
      value: { type: 'string' },
    },
  },
};

function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('MCPServer', () => {
  let server: MCPServer;

  const loggerOf = (target: MCPServer) => jest.mocked(target.getLogger());

  const requestHandler = (schema: unknown): RequestHandler => {
    const calls = jest.mocked(server.getServer().setRequestHandler).mock.calls;
    const registration = calls.find(([registered]) => registered === schema);
    if (!registration) throw new Error('handler not registered');
    return registration[1] as unknown as RequestHandler;
  };

  beforeEach(() => {
    jest.clearAllMocks();
    server = new MCPServer({
      skipTransportErrorHandling: true,
      skipGracefulShutdown: true,
    });
  });

  afterEach(async () => {
    if (server) {
      server.cleanup();
      await server.stop();
    }
  });

  describe('constructor', () => {
    it('should initialize the MCP server correctly', () => {
      expect(server.getLogger()).toBeDefined();
      expect(server.getServer()).toBeDefined();
      expect(loggerOf(server).info).toHaveBeenCalledWith('MCPServer initialized');
    });
  });

  describe('registerTool', () => {
    it('should register a tool successfully', () => {
      server.registerTool(echoTool, async () => 'ok');

      expect(server.getTools()).toEqual([echoTool]);
      expect(loggerOf(server).info).toHaveBeenCalledWith('Registered tool: echo');
    });

    it('should warn when overwriting an existing tool', () => {
      server.registerTool(echoTool, async () => 'first');
      server.registerTool(echoTool, async () => 'second');

      expect(server.getTools()).toHaveLength(1);
      expect(loggerOf(server).warn).toHaveBeenCalledWith(
        'Tool already registered: echo, overwriting',
      );
    });
  });

  describe('request handlers', () => {
    it('should list registered tools', async () => {
      server.registerTool(echoTool, async () => 'ok');

      await expect(requestHandler(ListToolsRequestSchema)({}, {})).resolves.toEqual({
        tools: [echoTool],
      });
    });

    it('should call the tool and wrap its result as text content', async () => {
      const handler = jest.fn<ToolHandler>(async (params) => ({ echoed: params }));
      server.registerTool(echoTool, handler);

      const result = await requestHandler(CallToolRequestSchema)(
        { method: 'tools/call', params: { name: 'echo', arguments: { value: 'hi' } } },
        { signal: new AbortController().signal, sendNotification: jest.fn() },
      );

      expect(result).toEqual({
        content: [{ type: 'text', text: JSON.stringify({ echoed: { value: 'hi' } }, null, 2) }],
      });
    });

    it('should pass the request signal to the tool', async () => {
      const signal = new AbortController().signal;
      let received: AbortSignal | undefined;
      server.registerTool(echoTool, async (_params, context) => {
        received = context.signal;
        return 'ok';
      });

      await requestHandler(CallToolRequestSchema)(
        { method: 'tools/call', params: { name: 'echo' } },
        { signal, sendNotification: jest.fn() },
      );

      expect(received).toBe(signal);
    });

    it('should send progress notifications when the client asked for them', async () => {
      const sendNotification = jest.fn(async () => undefined);
      server.registerTool(echoTool, async (_params, context) => {
        await context.reportProgress(1, 'Collecting requests');
        return 'done';
      });

      await requestHandler(CallToolRequestSchema)(
        {
          method: 'tools/call',
          params: { name: 'echo', arguments: {}, _meta: { progressToken: 'install-1' } },
        },
        { signal: new AbortController().signal, sendNotification },
      );

      expect(sendNotification).toHaveBeenCalledWith({
        method: 'notifications/progress',
        params: { progressToken: 'install-1', progress: 1, message: 'Collecting requests' },
      });
    });

    it('should not send progress without a progress token', async () => {
      const sendNotification = jest.fn(async () => undefined);
      server.registerTool(echoTool, async (_params, context) => {
        await context.reportProgress(1, 'ignored');
        return 'done';
      });

      await requestHandler(CallToolRequestSchema)(
        { method: 'tools/call', params: { name: 'echo', arguments: {} } },
        { signal: new AbortController().signal, sendNotification },
      );

      expect(sendNotification).not.toHaveBeenCalled();
    });

    it('should reject unknown tools', async () => {
      await expect(
        requestHandler(CallToolRequestSchema)(
          { method: 'tools/call', params: { name: 'missing' } },
          { signal: new AbortController().signal, sendNotification: jest.fn() },
        ),
      ).rejects.toThrow('Tool not found: missing');
    });

    it('should log long arguments in shortened form', async () => {
      server.registerTool(echoTool, async () => 'ok');
      const code = 'x'.repeat(500);

      await requestHandler(CallToolRequestSchema)(
        { method: 'tools/call', params: { name: 'echo', arguments: { code } } },
        { signal: new AbortController().signal, sendNotification: jest.fn() },
      );

      expect(loggerOf(server).info).toHaveBeenCalledWith('Executing tool: echo', {
        arguments: { code: `${'x'.repeat(120)}... (500 chars)` },
      });
    });
  });

  describe('executeTool', () => {
    it('should pass tool results that are already MCP results through', async () => {
      const toolResult = { content: [{ type: 'text', text: 'raw' }], isError: true };
      server.registerTool(echoTool, async () => toolResult);

      await expect(server.executeTool('echo', {})).resolves.toEqual(toolResult);
    });

    it('should throw for unknown tools', async () => {
      await expect(server.executeTool('missing', {})).rejects.toThrow('Tool not found: missing');
    });
  });

  describe('loadPlugin', () => {
    it('should load a plugin successfully', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'test-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
      };

      await server.loadPlugin(mockPlugin);

      expect(mockPlugin.initialize).toHaveBeenCalledWith(server);
      expect(loggerOf(server).info).toHaveBeenCalledWith('Loading plugin: test-plugin');
      expect(loggerOf(server).info).toHaveBeenCalledWith('Plugin loaded successfully: test-plugin');
    });

    it('should throw error when loading duplicate plugin', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'test-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
      };

      await server.loadPlugin(mockPlugin);

      await expect(server.loadPlugin(mockPlugin)).rejects.toThrow(
        'Plugin already loaded: test-plugin',
      );
    });

    it('should handle plugin initialization failure', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'failing-plugin',
        initialize: jest
          .fn<(server: MCPServer) => Promise<void>>()
          .mockRejectedValue(new Error('Plugin init failed')),
      };

      await expect(server.loadPlugin(mockPlugin)).rejects.toThrow('Plugin init failed');

      expect(loggerOf(server).error).toHaveBeenCalledWith('Failed to load plugin: failing-plugin', {
        error: expect.any(Error),
      });
    });
  });

  describe('start', () => {
    it('should start the server successfully', async () => {
      await server.start();

      expect(server.getServer().connect).toHaveBeenCalled();
      expect(loggerOf(server).info).toHaveBeenCalledWith('Starting MCP server...');
      expect(loggerOf(server).info).toHaveBeenCalledWith('MCP server started successfully');
    });

    it('should handle start failure', async () => {
      jest.mocked(server.getServer().connect).mockRejectedValue(new Error('Connection failed'));

      await expect(server.start()).rejects.toThrow('Connection failed');

      expect(loggerOf(server).error).toHaveBeenCalledWith('Failed to start MCP server', {
        error: expect.any(Error),
      });
    });
  });

  describe('stop', () => {
    it('should stop the server successfully', async () => {
      await server.stop();

      expect(server.getServer().close).toHaveBeenCalled();
      expect(loggerOf(server).info).toHaveBeenCalledWith('Stopping MCP server...');
      expect(loggerOf(server).info).toHaveBeenCalledWith('MCP server stopped');
    });

    it('should shutdown plugins on stop', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'test-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
        shutdown: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
      };

      await server.loadPlugin(mockPlugin);
      await server.stop();

      expect(mockPlugin.shutdown).toHaveBeenCalled();
      expect(loggerOf(server).info).toHaveBeenCalledWith('Plugin shutdown complete: test-plugin');
    });

    it('should handle plugin shutdown failure gracefully', async () => {
      const mockPlugin: MCPPlugin = {
        name: 'failing-plugin',
        initialize: jest.fn<(server: MCPServer) => Promise<void>>().mockResolvedValue(undefined),
        shutdown: jest.fn<() => Promise<void>>().mockRejectedValue(new Error('Shutdown failed')),
      };

      await server.loadPlugin(mockPlugin);
      await server.stop();

      expect(loggerOf(server).error).toHaveBeenCalledWith('Plugin shutdown failed: failing-plugin', {
        error: expect.any(Error),
      });
    });

    it('should prevent multiple stop calls', async () => {
      await server.stop();
      await server.stop();

      expect(server.getServer().close).toHaveBeenCalledTimes(1);
    });
  });

  describe('graceful shutdown', () => {
    let mockExit: jest.SpiedFunction<typeof process.exit>;
    let originalProcessOn: typeof process.on;
    let processHandlers: Record<string, (...args: unknown[]) => void>;

    beforeEach(() => {
      processHandlers = {};
      mockExit = jest.spyOn(process, 'exit').mockImplementation(() => undefined as never);
      originalProcessOn = process.on;

      // Capture the handlers instead of installing them
      process.on = jest.fn((event: string, handler: (...args: unknown[]) => void) => {
        processHandlers[event] = handler;
        return process;
      }) as unknown as typeof process.on;

      // Create a new server to register handlers (allow graceful shutdown for testing)
      server = new MCPServer({ skipTransportErrorHandling: true });
    });

    afterEach(() => {
      mockExit.mockRestore();
      process.on = originalProcessOn;
    });

    it('should handle SIGINT gracefully', async () => {
      const sigintHandler = processHandlers['SIGINT'];
      expect(sigintHandler).toBeDefined();

      sigintHandler();
      await flushPromises();

      expect(loggerOf(server).info).toHaveBeenCalledWith(
        'Received SIGINT, initiating graceful shutdown...',
      );
      expect(mockExit).toHaveBeenCalledWith(0);
    });

    it('should exit with a failure code on uncaught exceptions', async () => {
      processHandlers['uncaughtException'](new Error('boom'));
      await flushPromises();

      expect(loggerOf(server).error).toHaveBeenCalledWith('Uncaught exception:', {
        error: expect.any(Error),
      });
      expect(mockExit).toHaveBeenCalledWith(1);
    });
  });
});
