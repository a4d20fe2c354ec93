#!/usr/bin/env node
/**
 * Sandbox execution MCP server
 * Main entry point for the Model Context Protocol server
 */

import { loadSandboxConfig } from './config/SandboxConfig.js';
import { SandboxToolsPlugin } from './plugins/SandboxToolsPlugin.js';
import { DockerRuntime } from './runtime/DockerRuntime.js';
import { SandboxService } from './sandbox/SandboxService.js';
import { MCPServer } from './server/MCPServer.js';

export { SERVER_NAME, SERVER_VERSION } from './server/MCPServer.js';
export { SandboxService } from './sandbox/SandboxService.js';
export { loadSandboxConfig } from './config/SandboxConfig.js';

export async function main(): Promise<void> {
  console.error(`Sandbox execution MCP server - Starting...`);

  try {
    const config = loadSandboxConfig();
    const server = new MCPServer();
    const logger = server.getLogger();

    const runtime = new DockerRuntime({
      binary: config.dockerBinary,
      pullTimeoutMs: config.installTimeoutSeconds * 1000,
      logger,
    });
    const service = new SandboxService({ config, runtime, logger });

    await server.loadPlugin(
      new SandboxToolsPlugin({
        service,
        retentionSeconds: config.retentionSeconds,
        installLogTail: config.installLogTail,
        reaper: service.createReaper(),
      }),
    );

    await server.start();
    logger.info(`Sandboxes under ${config.baseDir}, image ${config.image}`);
    console.error(`Sandbox execution MCP server is running. Waiting for connections...`);
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}
