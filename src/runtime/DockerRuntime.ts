import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { existsSync } from 'fs';
import type { Logger } from 'winston';
import { errnoCode, InfrastructureError } from '../sandbox/ErrorHandling.js';
import type { CommandOutput, ContainerRuntime } from './types.js';

const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
const DEFAULT_PULL_TIMEOUT_MS = 300_000;

export interface DockerRuntimeOptions {
  binary?: string;
  commandTimeoutMs?: number;
  pullTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Gets common installation paths for the docker client
 */
function getCommonDockerPaths(binary: string): string[] {
  const paths = [
    `/usr/local/bin/${binary}`,
    `/usr/bin/${binary}`,
    `/opt/homebrew/bin/${binary}`,
    `/snap/bin/${binary}`,
  ];

  if (process.platform === 'win32') {
    paths.push(`C:\\Program Files\\Docker\\Docker\\resources\\bin\\${binary}.exe`);
  }

  return paths;
}

/**
 * Container runtime backed by the Docker CLI. Every call spawns the client directly,
 * never through a shell.
 */
export class DockerRuntime implements ContainerRuntime {
  private executable: string;
  private readonly commandTimeoutMs: number;
  private readonly pullTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: DockerRuntimeOptions = {}) {
    this.executable = options.binary ?? 'docker';
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.pullTimeoutMs = options.pullTimeoutMs ?? DEFAULT_PULL_TIMEOUT_MS;
    this.logger = options.logger;
  }

  get binary(): string {
    return this.executable;
  }

  spawn(args: string[]): ChildProcessWithoutNullStreams {
    this.logger?.debug(`Executing: ${this.executable} ${args.join(' ')}`);
    return spawn(this.executable, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env },
    });
  }

  exec(args: string[], timeoutMs: number = this.commandTimeoutMs): Promise<CommandOutput> {
    return new Promise((resolve, reject) => {
      let child: ChildProcessWithoutNullStreams;
      try {
        child = this.spawn(args);
      } catch (error) {
        reject(this.spawnFailure(args, error));
        return;
      }

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | null = null;

      const cleanup = () => {
        settled = true;
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
      };

      if (timeoutMs > 0) {
        timeoutHandle = setTimeout(() => {
          if (settled) return;
          cleanup();
          child.kill('SIGKILL');
          reject(
            new InfrastructureError(
              `docker ${args[0] ?? ''} timed out after ${timeoutMs}ms`,
              'Check that the Docker daemon is responsive',
              { args },
            ),
          );
        }, timeoutMs);
      }

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null) => {
        if (settled) return;
        cleanup();
        resolve({ exitCode: code, stdout, stderr });
      });

      child.on('error', (error: Error) => {
        if (settled) return;
        cleanup();
        reject(this.spawnFailure(args, error));
      });
    });
  }

  async isReachable(): Promise<boolean> {
    try {
      return await this.probeDaemon();
    } catch (error) {
      // Not on PATH: try the usual install locations once
      if (this.useFallbackBinary()) {
        try {
          return await this.probeDaemon();
        } catch (fallbackError) {
          error = fallbackError;
        }
      }
      this.logger?.debug('Docker daemon not reachable', { error });
      return false;
    }
  }

  private async probeDaemon(): Promise<boolean> {
    const result = await this.exec(['version', '--format', '{{.Server.Version}}']);
    return result.exitCode === 0;
  }

  async imageExists(image: string): Promise<boolean> {
    const result = await this.exec(['image', 'inspect', image]);
    return result.exitCode === 0;
  }

  async pullImage(image: string): Promise<void> {
    this.logger?.info(`Pulling image ${image}...`);
    const result = await this.exec(['pull', image], this.pullTimeoutMs);
    if (result.exitCode !== 0) {
      throw new InfrastructureError(
        `Docker failed to pull image '${image}'`,
        `Check Docker connectivity or pull the image manually: ${this.executable} pull ${image}`,
        { stderr: result.stderr.trim() },
      );
    }
    this.logger?.info(`Image ready: ${image}`);
  }

  async ensureImage(image: string, options: { pull?: boolean } = {}): Promise<void> {
    if (await this.imageExists(image)) {
      return;
    }
    if (!options.pull) {
      throw new InfrastructureError(
        `Docker image '${image}' not found locally and pulling is disabled`,
        `image not pulled: run ${this.executable} pull ${image}`,
      );
    }
    await this.pullImage(image);
  }

  async removeContainer(name: string): Promise<void> {
    const result = await this.exec(['rm', '-f', name]);
    if (result.exitCode !== 0 && !/no such container/i.test(result.stderr)) {
      this.logger?.warn(`Failed to remove container ${name}`, { stderr: result.stderr.trim() });
    }
  }

  private useFallbackBinary(): boolean {
    if (this.executable.includes('/') || this.executable.includes('\\')) {
      return false;
    }
    const candidate = getCommonDockerPaths(this.executable).find((p) => existsSync(p));
    if (!candidate) {
      return false;
    }
    this.logger?.info(`Using docker client at ${candidate}`);
    this.executable = candidate;
    return true;
  }

  private spawnFailure(args: string[], error: unknown): InfrastructureError {
    const message = error instanceof Error ? error.message : String(error);
    const missing = errnoCode(error) === 'ENOENT';
    return new InfrastructureError(
      missing
        ? `Docker binary '${this.executable}' not found`
        : `Failed to execute docker ${args[0] ?? ''}: ${message}`,
      missing
        ? 'Install Docker and ensure it is on PATH, or set DOCKER_BINARY'
        : 'Is the Docker daemon running?',
      { args },
    );
  }
}
