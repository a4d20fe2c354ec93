import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import type { ContainerProcess, ContainerRuntime } from '../runtime/types.js';
import { errnoCode, InfrastructureError, SandboxError } from './ErrorHandling.js';
import { PACKAGES_DIR } from './SandboxRegistry.js';
import type {
  ExceededResource,
  ExecutionRequest,
  ExecutionResult,
  ExecutionStatus,
  ResourceLimits,
  SandboxRecord,
} from './types.js';

/** Where the sandbox root is mounted inside every container */
export const WORKSPACE_MOUNT = '/workspace';
/** Search path that makes installed packages importable by later runs */
export const PACKAGES_MOUNT = `${WORKSPACE_MOUNT}/${PACKAGES_DIR}`;

const TIMEOUT_EXIT_CODE = 124;
const CANCELLED_EXIT_CODE = 130;
const OOM_EXIT_CODE = 137;

// Messages the docker client prints when it fails before user code runs
const RUNTIME_FAILURE_PATTERN =
  /^docker: |Error response from daemon|Cannot connect to the Docker daemon|Unable to find image|OCI runtime/m;
const PROCESS_LIMIT_PATTERN =
  /Resource temporarily unavailable|can't start new thread|fork: retry|BlockingIOError: \[Errno 11\]/;

export interface ContainerLauncherOptions {
  runtime: ContainerRuntime;
  image: string;
  containerUser?: string;
  tmpfsSizeMb?: number;
  maxOutputBytes?: number;
  /** How long to wait for the client to exit after it was killed */
  killGraceMs?: number;
  logger?: Logger;
}

export interface RunArgsSpec {
  name: string;
  rootDir: string;
  workdir: string;
  limits: ResourceLimits;
}

export interface LaunchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  input?: string;
  onStdout(chunk: Buffer): void;
  onStderr(chunk: Buffer): void;
}

export interface LaunchOutcome {
  exitCode: number | null;
  timedOut: boolean;
  cancelled: boolean;
  durationMs: number;
}

/**
 * Size-capped capture of one output stream
 */
export class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    const remaining = this.limit - this.size;
    if (remaining <= 0) {
      this.truncated = true;
      return;
    }
    if (chunk.length > remaining) {
      this.chunks.push(chunk.subarray(0, remaining));
      this.size += remaining;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

function asBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
}

/**
 * Builds hardened container invocations and runs them as bounded subprocesses.
 */
export class ContainerLauncher {
  protected readonly runtime: ContainerRuntime;
  protected readonly image: string;
  protected readonly containerUser: string;
  protected readonly tmpfsSizeMb: number;
  protected readonly maxOutputBytes: number;
  protected readonly killGraceMs: number;
  protected readonly logger?: Logger;
  private imageReady = false;

  constructor(options: ContainerLauncherOptions) {
    this.runtime = options.runtime;
    this.image = options.image;
    this.containerUser = options.containerUser ?? '1000:1000';
    this.tmpfsSizeMb = options.tmpfsSizeMb ?? 64;
    this.maxOutputBytes = options.maxOutputBytes ?? 100_000;
    this.killGraceMs = options.killGraceMs ?? 5_000;
    this.logger = options.logger;
  }

  /** Skip the per-launch image check, e.g. after a successful pre-pull */
  markImageReady(): void {
    this.imageReady = true;
  }

  buildRunArgs(spec: RunArgsSpec): string[] {
    const sub = spec.workdir.replace(/^\/+/, '').replace(/^\.$/, '');
    const workdir = sub ? `${WORKSPACE_MOUNT}/${sub}` : WORKSPACE_MOUNT;

    return [
      'run',
      '--rm',
      '-i', // code arrives on stdin
      '--name',
      spec.name,
      '--network',
      'none',
      ...this.hardeningArgs(spec.limits, `/tmp:rw,noexec,nosuid,size=${this.tmpfsSizeMb}m`),
      '-v',
      `${spec.rootDir}:${WORKSPACE_MOUNT}:rw`,
      '-w',
      workdir,
      '-e',
      'PYTHONDONTWRITEBYTECODE=1',
      '-e',
      'PYTHONUNBUFFERED=1',
      '-e',
      `PYTHONPATH=${PACKAGES_MOUNT}`,
      this.image,
      'python',
      '-',
    ];
  }

  async run(
    sandbox: SandboxRecord,
    request: ExecutionRequest,
    signal?: AbortSignal,
  ): Promise<ExecutionResult> {
    await this.prepareImage();

    const name = this.containerName('sbx-run');
    const args = this.buildRunArgs({
      name,
      rootDir: sandbox.rootDir,
      workdir: request.workdir,
      limits: request.limits,
    });
    const stdout = new OutputBuffer(this.maxOutputBytes);
    const stderr = new OutputBuffer(this.maxOutputBytes);

    this.logger?.info(`Running code for user ${sandbox.userId}`, {
      container: name,
      workdir: request.workdir,
      timeoutMs: request.timeoutMs,
    });

    const outcome = await this.launch(name, args, {
      timeoutMs: request.timeoutMs,
      signal,
      input: request.code,
      onStdout: (chunk) => stdout.append(chunk),
      onStderr: (chunk) => stderr.append(chunk),
    });

    const stderrText = stderr.toString();
    if (this.isRuntimeFailure(outcome, stderrText)) {
      throw new InfrastructureError(
        `Container runtime failed to start the sandbox: ${stderrText.trim().split('\n')[0]}`,
        this.remediationFor(stderrText),
        { exitCode: outcome.exitCode },
      );
    }

    const { status, resource } = this.classify(outcome, stderrText);
    const result: ExecutionResult = {
      stdout: stdout.toString(),
      stderr: stderrText,
      exitCode: this.exitCodeOf(outcome),
      timedOut: outcome.timedOut,
      truncated: stdout.truncated || stderr.truncated,
      status,
      durationMs: outcome.durationMs,
    };
    if (resource) {
      result.resource = resource;
    }

    this.logger?.info(`Run finished for user ${sandbox.userId}`, {
      container: name,
      status,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    });
    return result;
  }

  /**
   * Flags shared by every container: caps dropped, no privilege escalation, non-root
   * numeric user, read-only root filesystem with a memory-backed /tmp, and ceilings.
   * Swap is pinned to the memory limit so exceeding it is an OOM kill.
   */
  protected hardeningArgs(limits: ResourceLimits, tmpfs: string): string[] {
    return [
      '--read-only',
      '--tmpfs',
      tmpfs,
      '--pids-limit',
      String(limits.pidsLimit),
      '--cpus',
      String(limits.cpus),
      '--memory',
      String(limits.memoryBytes),
      '--memory-swap',
      String(limits.memoryBytes),
      '--cap-drop',
      'ALL',
      '--security-opt',
      'no-new-privileges',
      '--user',
      this.containerUser,
    ];
  }

  protected containerName(prefix: string): string {
    return `${prefix}-${randomUUID().replace(/-/g, '').slice(0, 12)}`;
  }

  protected async prepareImage(): Promise<void> {
    if (this.imageReady) return;
    await this.runtime.ensureImage(this.image, { pull: true });
    this.imageReady = true;
  }

  /**
   * Spawn the container client and wait for it, racing its exit against the wall
   * clock and the abort signal. On either, the container is force-removed and the
   * client killed; whatever output arrived is kept.
   */
  protected launch(name: string, args: string[], options: LaunchOptions): Promise<LaunchOutcome> {
    const started = Date.now();

    let proc: ContainerProcess;
    try {
      proc = this.runtime.spawn(args);
    } catch (error) {
      return Promise.reject(this.launchFailure(error));
    }

    return new Promise<LaunchOutcome>((resolve, reject) => {
      let timedOut = false;
      let cancelled = false;
      let settled = false;
      let graceTimer: NodeJS.Timeout | null = null;

      const settle = () => {
        settled = true;
        clearTimeout(timer);
        if (graceTimer) clearTimeout(graceTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      const finish = (exitCode: number | null) => {
        if (settled) return;
        settle();
        resolve({ exitCode, timedOut, cancelled, durationMs: Date.now() - started });
      };

      const terminate = (reason: 'timeout' | 'cancel') => {
        if (settled || timedOut || cancelled) return;
        if (reason === 'timeout') {
          timedOut = true;
        } else {
          cancelled = true;
        }
        this.logger?.warn(`Terminating container ${name} (${reason})`);
        this.runtime.removeContainer(name).catch((error: unknown) => {
          this.logger?.warn(`Failed to remove container ${name}`, { error });
        });
        proc.kill('SIGKILL');
        graceTimer = setTimeout(() => finish(null), this.killGraceMs);
      };

      const timer = setTimeout(() => terminate('timeout'), options.timeoutMs);
      const onAbort = () => terminate('cancel');

      proc.stdout.on('data', (chunk: Buffer | string) => options.onStdout(asBuffer(chunk)));
      proc.stderr.on('data', (chunk: Buffer | string) => options.onStderr(asBuffer(chunk)));
      proc.on('close', (code) => finish(code));
      proc.on('error', (error) => {
        if (settled) return;
        if (timedOut || cancelled) {
          this.logger?.debug(`Container client error after termination: ${error.message}`);
          return;
        }
        settle();
        reject(this.launchFailure(error));
      });

      // The client may exit before reading all input
      proc.stdin.on('error', (error: Error) => {
        this.logger?.debug(`Container stdin closed early: ${error.message}`);
      });
      proc.stdin.end(options.input ?? '');

      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  protected isRuntimeFailure(outcome: LaunchOutcome, stderr: string): boolean {
    if (outcome.timedOut || outcome.cancelled) return false;
    const code = outcome.exitCode;
    return (code === 125 || code === 126 || code === 127) && RUNTIME_FAILURE_PATTERN.test(stderr);
  }

  protected remediationFor(stderr: string): string {
    if (/Unable to find image|No such image|pull access denied|manifest unknown/i.test(stderr)) {
      return `image not pulled: run docker pull ${this.image}`;
    }
    if (/Cannot connect to the Docker daemon/i.test(stderr)) {
      return 'Docker daemon unreachable: start Docker or check DOCKER_HOST';
    }
    return 'Check the Docker daemon logs';
  }

  protected exitCodeOf(outcome: LaunchOutcome): number {
    if (outcome.timedOut) return TIMEOUT_EXIT_CODE;
    if (outcome.cancelled) return CANCELLED_EXIT_CODE;
    return outcome.exitCode ?? 1;
  }

  private classify(
    outcome: LaunchOutcome,
    stderr: string,
  ): { status: ExecutionStatus; resource?: ExceededResource } {
    if (outcome.timedOut) return { status: 'timeout' };
    if (outcome.cancelled) return { status: 'cancelled' };
    if (outcome.exitCode === OOM_EXIT_CODE) {
      return { status: 'resource_exceeded', resource: 'memory' };
    }
    if (outcome.exitCode !== 0 && PROCESS_LIMIT_PATTERN.test(stderr)) {
      return { status: 'resource_exceeded', resource: 'processes' };
    }
    return { status: 'completed' };
  }

  private launchFailure(error: unknown): SandboxError {
    if (error instanceof SandboxError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    const missing = errnoCode(error) === 'ENOENT';
    return new InfrastructureError(
      missing ? 'Docker client not found' : `Failed to launch container: ${message}`,
      missing
        ? 'Install Docker and ensure it is on PATH, or set DOCKER_BINARY'
        : 'Is the Docker daemon running?',
    );
  }
}
