import fs from 'fs';
import path from 'path';
import type { Logger } from 'winston';
import { resourceLimitsFrom, type SandboxConfig } from '../config/SandboxConfig.js';
import type { ContainerRuntime } from '../runtime/types.js';
import { ContainerLauncher } from './ContainerLauncher.js';
import {
  EntryNotFoundError,
  InfrastructureError,
  InvalidRequestError,
  toSandboxError,
} from './ErrorHandling.js';
import { ExpiryReaper } from './ExpiryReaper.js';
import { InstallJobRunner } from './InstallJobRunner.js';
import { LogThrottler } from './LogThrottler.js';
import { type FormattedOutput, OutputFormatter, renderExecutionResult } from './OutputFormatter.js';
import { assertInside, resolveEntry, resolveInside, toRelative } from './PathGuard.js';
import {
  CancelRequestSchema,
  CreateRequestSchema,
  DeleteRequestSchema,
  InfoRequestSchema,
  InstallRequestSchema,
  ListRequestSchema,
  parseRequest,
  RemoveRequestSchema,
  RunRequestSchema,
  WriteRequestSchema,
} from './RequestSchemas.js';
import { SandboxLocks } from './SandboxLocks.js';
import { measureDirectorySize, SandboxRegistry } from './SandboxRegistry.js';
import type {
  DirectoryEntry,
  DirectoryPage,
  EntryType,
  ExecutionResult,
  HealthStatus,
  InstallEvent,
  SandboxRecord,
} from './types.js';

export interface SandboxServiceOptions {
  config: SandboxConfig;
  runtime: ContainerRuntime;
  logger?: Logger;
  clock?: () => number;
  registry?: SandboxRegistry;
  locks?: SandboxLocks;
  launcher?: ContainerLauncher;
  installer?: InstallJobRunner;
  formatter?: OutputFormatter;
}

export interface RunOutcome {
  result: ExecutionResult;
  output: FormattedOutput;
}

export interface WriteOutcome {
  path: string;
  bytes: number;
}

export interface RemoveOutcome {
  path: string;
  type: EntryType;
}

interface InflightJob {
  controller: AbortController;
  detach(): void;
}

export interface CancelOutcome {
  cancelled: boolean;
  operation: string | null;
}

/** Create or truncate, refusing a final component that is a symlink */
const WRITE_NO_FOLLOW =
  fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_TRUNC | fs.constants.O_NOFOLLOW;

function entryTypeOf(entry: fs.Dirent | fs.Stats): EntryType {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

/**
 * Operations offered to front ends. Every request is validated, resolved to a
 * single sandbox and serialized through its lock before reaching the filesystem or
 * the container runtime.
 */
export class SandboxService {
  readonly registry: SandboxRegistry;
  readonly locks: SandboxLocks;
  readonly formatter: OutputFormatter;
  private readonly config: SandboxConfig;
  private readonly runtime: ContainerRuntime;
  private readonly launcher: ContainerLauncher;
  private readonly installer: InstallJobRunner;
  private readonly logger?: Logger;
  private readonly inflight = new Map<string, InflightJob>();

  constructor(options: SandboxServiceOptions) {
    const { config, runtime, logger } = options;
    this.config = config;
    this.runtime = runtime;
    this.logger = logger;

    const launcherOptions = {
      runtime,
      image: config.image,
      containerUser: config.containerUser,
      tmpfsSizeMb: config.tmpfsSizeMb,
      maxOutputBytes: config.maxOutputBytes,
      logger,
    };

    this.registry =
      options.registry ??
      new SandboxRegistry({ baseDir: config.baseDir, logger, clock: options.clock });
    this.locks = options.locks ?? new SandboxLocks();
    this.launcher = options.launcher ?? new ContainerLauncher(launcherOptions);
    this.installer =
      options.installer ??
      new InstallJobRunner({
        ...launcherOptions,
        network: config.installNetwork,
        throttler: new LogThrottler(config.logThrottleMs),
        logTail: config.installLogTail,
        clock: options.clock,
      });
    this.formatter =
      options.formatter ??
      new OutputFormatter({
        inlineLimit: config.inlineOutputLimit,
        previewLength: config.previewLength,
      });
  }

  /**
   * Load persisted sandboxes and, when configured, pull the image ahead of the first
   * run. A failed pull is not fatal; launches retry it on demand.
   */
  async prepare(): Promise<void> {
    this.registry.load();

    if (!this.config.pullOnStartup) return;
    try {
      await this.runtime.ensureImage(this.config.image, { pull: true });
      this.launcher.markImageReady();
      this.installer.markImageReady();
      this.logger?.info(`Image ready: ${this.config.image}`);
    } catch (error) {
      if (!(error instanceof InfrastructureError)) throw error;
      this.logger?.warn(`Image pre-pull failed, will retry on first run: ${error.message}`, {
        hint: error.hint,
      });
    }
  }

  /** Reaper that removes expired sandboxes through the locked delete path */
  createReaper(): ExpiryReaper {
    return new ExpiryReaper({
      registry: this.registry,
      retentionSeconds: this.config.retentionSeconds,
      intervalMs: this.config.reapIntervalSeconds * 1000,
      remove: (userId) => this.deleteSandbox(userId),
      logger: this.logger,
    });
  }

  create(userId: string): SandboxRecord {
    const request = parseRequest(CreateRequestSchema, { userId });
    return this.registry.create(request.userId);
  }

  getSandbox(userId: string): SandboxRecord {
    const request = parseRequest(InfoRequestSchema, { userId });
    return this.registry.get(request.userId);
  }

  async run(
    userId: string,
    code: string,
    workdir?: string,
    signal?: AbortSignal,
  ): Promise<RunOutcome> {
    const request = parseRequest(RunRequestSchema, { userId, code, workdir });
    const sandbox = this.registry.get(request.userId);
    const release = this.locks.acquireExecution(request.userId, 'run');
    const controller = this.track(request.userId, signal);

    try {
      const directory = this.resolveDirectory(sandbox.rootDir, request.workdir);
      const timeoutMs = this.config.runTimeoutSeconds * 1000;
      const result = await this.launcher.run(
        sandbox,
        {
          code: request.code,
          workdir: toRelative(sandbox.rootDir, directory),
          timeoutMs,
          limits: resourceLimitsFrom(this.config),
        },
        controller.signal,
      );

      this.registry.touch(request.userId);
      await this.refreshSize(sandbox);

      const rendered = renderExecutionResult(result, timeoutMs);
      return { result, output: this.formatter.format(rendered, result.exitCode) };
    } finally {
      this.untrack(request.userId);
      release();
    }
  }

  listDirectory(userId: string, userPath?: string, page?: number): DirectoryPage {
    const request = parseRequest(ListRequestSchema, { userId, path: userPath, page });
    const sandbox = this.registry.get(request.userId);
    const release = this.locks.acquireShared(request.userId);

    try {
      const directory = this.resolveDirectory(sandbox.rootDir, request.path);
      const entries: DirectoryEntry[] = fs
        .readdirSync(directory, { withFileTypes: true })
        .map((dirent) => this.describeEntry(directory, dirent))
        .sort((a, b) => {
          const aDir = a.type === 'directory' ? 0 : 1;
          const bDir = b.type === 'directory' ? 0 : 1;
          if (aDir !== bDir) return aDir - bDir;
          const aName = a.name.toLowerCase();
          const bName = b.name.toLowerCase();
          return aName < bName ? -1 : aName > bName ? 1 : 0;
        });

      const pageSize = this.config.pageSize;
      const totalPages = Math.max(1, Math.ceil(entries.length / pageSize));
      const current = Math.min(request.page, totalPages);
      const start = (current - 1) * pageSize;

      this.registry.touch(request.userId);
      return {
        path: toRelative(sandbox.rootDir, directory),
        page: current,
        totalPages,
        totalEntries: entries.length,
        entries: entries.slice(start, start + pageSize),
      };
    } catch (error) {
      throw toSandboxError(error, request.path ?? '.');
    } finally {
      release();
    }
  }

  async writeFile(userId: string, userPath: string, content: string): Promise<WriteOutcome> {
    const request = parseRequest(WriteRequestSchema, { userId, path: userPath, content });
    const sandbox = this.registry.get(request.userId);
    const release = this.locks.acquireShared(request.userId);

    try {
      const target = resolveInside(sandbox.rootDir, request.path);
      if (target === fs.realpathSync(sandbox.rootDir)) {
        throw new InvalidRequestError('Cannot write to the sandbox root');
      }
      if (fs.statSync(target, { throwIfNoEntry: false })?.isDirectory()) {
        throw new InvalidRequestError(`A directory exists with that name: ${request.path}`);
      }

      const parent = path.dirname(target);
      if (fs.statSync(parent, { throwIfNoEntry: false })?.isDirectory() === false) {
        throw new InvalidRequestError(`Not a directory: ${path.posix.dirname(request.path)}`);
      }
      await fs.promises.mkdir(parent, { recursive: true });
      assertInside(sandbox.rootDir, parent);
      await fs.promises.writeFile(target, request.content, {
        encoding: 'utf-8',
        flag: WRITE_NO_FOLLOW,
      });

      this.registry.touch(request.userId);
      await this.refreshSize(sandbox);
      this.logger?.debug(`Wrote ${request.path} for user ${request.userId}`);

      return {
        path: toRelative(sandbox.rootDir, target),
        bytes: Buffer.byteLength(request.content, 'utf-8'),
      };
    } catch (error) {
      throw toSandboxError(error, request.path);
    } finally {
      release();
    }
  }

  async removeEntry(userId: string, userPath: string, recursive?: boolean): Promise<RemoveOutcome> {
    const request = parseRequest(RemoveRequestSchema, { userId, path: userPath, recursive });
    const sandbox = this.registry.get(request.userId);
    const release = this.locks.acquireShared(request.userId);

    try {
      const target = resolveEntry(sandbox.rootDir, request.path);
      const stat = fs.lstatSync(target, { throwIfNoEntry: false });
      if (stat === undefined) {
        throw new EntryNotFoundError(request.path);
      }

      const type = entryTypeOf(stat);
      if (type === 'directory') {
        if (request.recursive) {
          await fs.promises.rm(target, { recursive: true, force: true });
        } else {
          await fs.promises.rmdir(target);
        }
      } else {
        await fs.promises.unlink(target);
      }

      this.registry.touch(request.userId);
      await this.refreshSize(sandbox);
      return { path: toRelative(sandbox.rootDir, target), type };
    } catch (error) {
      throw toSandboxError(error, request.path);
    } finally {
      release();
    }
  }

  /**
   * Install packages into the sandbox's package directory. The lock is taken when
   * iteration starts and released when the stream ends or is abandoned.
   */
  async *installPackages(
    userId: string,
    packages: string[],
    signal?: AbortSignal,
  ): AsyncGenerator<InstallEvent, void, undefined> {
    const request = parseRequest(InstallRequestSchema, { userId, packages });
    const sandbox = this.registry.get(request.userId);
    const release = this.locks.acquireExecution(request.userId, 'install');
    const controller = this.track(request.userId, signal);

    try {
      const events = this.installer.install(
        sandbox,
        {
          packages: request.packages,
          timeoutMs: this.config.installTimeoutSeconds * 1000,
          limits: resourceLimitsFrom(this.config),
        },
        controller.signal,
      );
      for await (const event of events) {
        if (event.type === 'complete') {
          this.registry.touch(request.userId);
          await this.refreshSize(sandbox);
        }
        yield event;
      }
    } finally {
      this.untrack(request.userId);
      release();
    }
  }

  async deleteSandbox(userId: string): Promise<void> {
    const request = parseRequest(DeleteRequestSchema, { userId });
    this.registry.get(request.userId);
    const release = this.locks.acquireDelete(request.userId);

    try {
      await this.registry.delete(request.userId);
      this.locks.forget(request.userId);
    } finally {
      release();
    }
  }

  /** Abort the run or install in progress for a user, if any */
  cancel(userId: string): CancelOutcome {
    const request = parseRequest(CancelRequestSchema, { userId });
    this.registry.get(request.userId);

    const job = this.inflight.get(request.userId);
    if (!job || job.controller.signal.aborted) {
      return { cancelled: false, operation: null };
    }
    const operation = this.locks.heldBy(request.userId);
    job.controller.abort();
    this.logger?.info(`Cancelled ${operation ?? 'operation'} for user ${request.userId}`);
    return { cancelled: true, operation };
  }

  async healthCheck(): Promise<HealthStatus> {
    const image = this.config.image;
    const runtimeReachable = await this.runtime.isReachable();
    if (!runtimeReachable) {
      return {
        runtimeReachable,
        imagePresent: false,
        image,
        detail: 'Docker daemon unreachable: start Docker or check DOCKER_HOST',
      };
    }

    const imagePresent = await this.runtime.imageExists(image);
    if (imagePresent) {
      return { runtimeReachable, imagePresent, image };
    }
    return {
      runtimeReachable,
      imagePresent,
      image,
      detail: `image not pulled: run docker pull ${image}`,
    };
  }

  /** Abort every job in progress */
  shutdown(): void {
    for (const [userId, job] of this.inflight) {
      this.logger?.info(`Aborting in-flight job for user ${userId}`);
      job.controller.abort();
    }
  }

  /**
   * Register the abort controller of a user's job. An abort of the caller's signal
   * aborts the job too.
   */
  private track(userId: string, signal?: AbortSignal): AbortController {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
    this.inflight.set(userId, {
      controller,
      detach: () => signal?.removeEventListener('abort', onAbort),
    });
    return controller;
  }

  private untrack(userId: string): void {
    this.inflight.get(userId)?.detach();
    this.inflight.delete(userId);
  }

  private resolveDirectory(rootDir: string, userPath: string | undefined): string {
    const directory = resolveInside(rootDir, userPath);
    const stat = fs.statSync(directory, { throwIfNoEntry: false });
    if (stat === undefined) {
      throw new EntryNotFoundError(userPath ?? '.');
    }
    if (!stat.isDirectory()) {
      throw new InvalidRequestError(`Not a directory: ${userPath ?? '.'}`);
    }
    return directory;
  }

  private describeEntry(directory: string, dirent: fs.Dirent): DirectoryEntry {
    const type = entryTypeOf(dirent);
    if (type !== 'file') {
      return { name: dirent.name, type };
    }
    const stat = fs.lstatSync(path.join(directory, dirent.name), { throwIfNoEntry: false });
    return stat ? { name: dirent.name, type, sizeBytes: stat.size } : { name: dirent.name, type };
  }

  /** Best effort: user code controls the tree, so a failed walk keeps the last size */
  private async refreshSize(sandbox: SandboxRecord): Promise<void> {
    let size: number;
    try {
      size = await measureDirectorySize(sandbox.rootDir);
    } catch (error) {
      this.logger?.warn(`Could not measure sandbox of user ${sandbox.userId}`, { error });
      return;
    }
    this.registry.updateSize(sandbox.userId, size);
  }
}
