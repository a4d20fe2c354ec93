import fs from 'fs';
import path from 'path';
import { BoundedChannel } from './BoundedChannel.js';
import {
  ContainerLauncher,
  type ContainerLauncherOptions,
  type LaunchOutcome,
  PACKAGES_MOUNT,
} from './ContainerLauncher.js';
import { InfrastructureError, PathEscapeError, SandboxError } from './ErrorHandling.js';
import { createThrottleState, LogThrottler } from './LogThrottler.js';
import { resolveInside } from './PathGuard.js';
import { PACKAGES_DIR } from './SandboxRegistry.js';
import type { InstallEvent, InstallResult, ResourceLimits, SandboxRecord } from './types.js';

const INSTALL_TMPFS_MB = 256;

export interface InstallJobRunnerOptions extends ContainerLauncherOptions {
  /** Docker network the installer joins; the only container that gets one */
  network?: string;
  throttler?: LogThrottler;
  /** Characters of the log carried by each progress event */
  logTail?: number;
  clock?: () => number;
}

export interface InstallRequest {
  packages: string[];
  timeoutMs: number;
  limits: ResourceLimits;
}

export interface InstallArgsSpec {
  name: string;
  packagesDir: string;
  packages: string[];
  limits: ResourceLimits;
}

type Settled = { outcome: LaunchOutcome } | { error: unknown };

/**
 * Runs a package installer in a short-lived container that can reach a package index
 * but sees only the sandbox's package directory. Progress is exposed as a stream of
 * throttled log snapshots ending in exactly one completion event.
 */
export class InstallJobRunner extends ContainerLauncher {
  private readonly network: string;
  private readonly throttler: LogThrottler;
  private readonly logTail: number;
  private readonly clock: () => number;

  constructor(options: InstallJobRunnerOptions) {
    super(options);
    this.network = options.network ?? 'bridge';
    this.throttler = options.throttler ?? new LogThrottler();
    this.logTail = options.logTail ?? 1800;
    this.clock = options.clock ?? Date.now;
  }

  buildInstallArgs(spec: InstallArgsSpec): string[] {
    return [
      'run',
      '--rm',
      '--name',
      spec.name,
      '--network',
      this.network,
      ...this.hardeningArgs(spec.limits, `/tmp:rw,nosuid,size=${INSTALL_TMPFS_MB}m`),
      '-v',
      `${spec.packagesDir}:${PACKAGES_MOUNT}:rw`,
      '-w',
      '/tmp',
      '-e',
      'HOME=/tmp',
      '-e',
      'PIP_DISABLE_PIP_VERSION_CHECK=1',
      '-e',
      'PYTHONUNBUFFERED=1',
      this.image,
      'python',
      '-m',
      'pip',
      'install',
      '--no-cache-dir',
      '--upgrade',
      '--target',
      PACKAGES_MOUNT,
      ...spec.packages,
    ];
  }

  /**
   * Start an install and stream its progress. Stopping iteration early cancels the
   * job and removes its container.
   */
  async *install(
    sandbox: SandboxRecord,
    request: InstallRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<InstallEvent, void, undefined> {
    const startedAt = this.clock();
    const packages = [...request.packages];

    let packagesDir: string;
    try {
      await this.prepareImage();
      packagesDir = this.preparePackagesDir(sandbox.rootDir);
    } catch (error) {
      if (!(error instanceof SandboxError)) throw error;
      yield {
        type: 'complete',
        result: this.failure(packages, this.describeFailure(error), startedAt),
      };
      return;
    }

    const name = this.containerName('sbx-install');
    const args = this.buildInstallArgs({ name, packagesDir, packages, limits: request.limits });

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    let log = '';
    const snapshots = new BoundedChannel<string>(1);
    const append = (chunk: Buffer) => {
      log += chunk.toString('utf-8');
      snapshots.push(log);
    };

    this.logger?.info(`Installing packages for user ${sandbox.userId}`, {
      container: name,
      packages,
    });

    const running: Promise<Settled> = this.launch(name, args, {
      timeoutMs: request.timeoutMs,
      signal: controller.signal,
      onStdout: append,
      onStderr: append,
    }).then(
      (outcome) => {
        snapshots.close();
        return { outcome };
      },
      (error: unknown) => {
        snapshots.close();
        return { error };
      },
    );

    const throttle = createThrottleState(startedAt);
    let completed = false;
    try {
      for await (const snapshot of snapshots) {
        const now = this.clock();
        if (!this.throttler.shouldEmit(throttle, now)) continue;
        this.throttler.record(throttle, now);
        yield { type: 'progress', log: this.tail(snapshot), elapsedMs: now - startedAt };
      }

      const settled = await running;
      const result =
        'outcome' in settled
          ? this.resultOf(settled.outcome, packages, log)
          : this.failure(packages, `${log}${this.describeFailure(settled.error)}`, startedAt);

      this.logger?.info(`Install finished for user ${sandbox.userId}`, {
        container: name,
        success: result.success,
        exitCode: result.exitCode,
        durationMs: result.durationMs,
      });

      completed = true;
      yield { type: 'complete', result };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!completed) {
        controller.abort();
        await running;
      }
    }
  }

  /**
   * The package directory is mounted from the host, so it must be a real directory
   * inside the sandbox root, never a link planted by user code.
   */
  private preparePackagesDir(rootDir: string): string {
    const packagesDir = path.join(rootDir, PACKAGES_DIR);
    const stat = fs.lstatSync(packagesDir, { throwIfNoEntry: false });
    if (stat === undefined) {
      fs.mkdirSync(packagesDir);
    } else if (!stat.isDirectory()) {
      throw new PathEscapeError(PACKAGES_DIR, { reason: 'package directory is not a directory' });
    }
    return resolveInside(rootDir, PACKAGES_DIR);
  }

  private resultOf(outcome: LaunchOutcome, packages: string[], log: string): InstallResult {
    let finalLog = log;
    if (outcome.timedOut) {
      finalLog += '\n[install timed out]';
    } else if (outcome.cancelled) {
      finalLog += '\n[install cancelled]';
    }
    return {
      success: outcome.exitCode === 0 && !outcome.timedOut && !outcome.cancelled,
      exitCode: outcome.timedOut || outcome.cancelled ? null : outcome.exitCode,
      timedOut: outcome.timedOut,
      cancelled: outcome.cancelled,
      finalLog,
      packages,
      durationMs: outcome.durationMs,
    };
  }

  private failure(packages: string[], finalLog: string, startedAt: number): InstallResult {
    return {
      success: false,
      exitCode: null,
      timedOut: false,
      cancelled: false,
      finalLog,
      packages,
      durationMs: this.clock() - startedAt,
    };
  }

  private describeFailure(error: unknown): string {
    if (error instanceof InfrastructureError && error.hint) {
      return `${error.message}\n${error.hint}`;
    }
    return error instanceof Error ? error.message : String(error);
  }

  private tail(log: string): string {
    return log.length <= this.logTail ? log : log.slice(log.length - this.logTail);
  }
}
