import type { Logger } from 'winston';
import type { SandboxRegistry } from './SandboxRegistry.js';

export interface SweepReport {
  examined: number;
  deleted: string[];
  failed: string[];
  /** Expired at listing time but active again by the time they were reached */
  skipped: string[];
}

export interface ExpiryReaperOptions {
  registry: SandboxRegistry;
  retentionSeconds: number;
  intervalMs: number;
  /** Deletes one sandbox; defaults to the registry, the service passes its locked delete */
  remove?: (userId: string) => Promise<void>;
  clock?: () => number;
  logger?: Logger;
}

/**
 * Periodically deletes sandboxes idle for longer than the retention window.
 * Only one sweep runs at a time; a tick that finds a sweep in progress is skipped.
 */
export class ExpiryReaper {
  private readonly registry: SandboxRegistry;
  private readonly retentionSeconds: number;
  private readonly intervalMs: number;
  private readonly remove: (userId: string) => Promise<void>;
  private readonly clock: () => number;
  private readonly logger?: Logger;
  private timer: NodeJS.Timeout | null = null;
  private active: Promise<SweepReport> | null = null;

  constructor(options: ExpiryReaperOptions) {
    this.registry = options.registry;
    this.retentionSeconds = options.retentionSeconds;
    this.intervalMs = options.intervalMs;
    this.remove = options.remove ?? ((userId) => options.registry.delete(userId));
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.active) {
        this.logger?.debug('Previous expiry sweep still running, skipping tick');
        return;
      }
      this.sweep().catch((error: unknown) => {
        this.logger?.error('Expiry sweep failed', { error });
      });
    }, this.intervalMs);
    this.timer.unref();
    this.logger?.info(
      `Expiry reaper started (every ${this.intervalMs}ms, retention ${this.retentionSeconds}s)`,
    );
  }

  /** Stop scheduling and wait for a sweep in progress */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.active) {
      await this.active;
    }
  }

  get running(): boolean {
    return this.active !== null;
  }

  /**
   * Run one sweep. Concurrent callers share the sweep already in progress.
   */
  sweep(now?: number): Promise<SweepReport> {
    if (this.active) {
      return this.active;
    }
    this.active = this.runSweep(now).finally(() => {
      this.active = null;
    });
    return this.active;
  }

  private async runSweep(now?: number): Promise<SweepReport> {
    const at = now ?? this.clock();
    const expired = this.registry.listExpired(at, this.retentionSeconds);
    const report: SweepReport = { examined: expired.length, deleted: [], failed: [], skipped: [] };

    for (const userId of expired) {
      // Activity may have arrived while earlier entries were being removed
      if (!this.registry.isExpired(userId, now ?? this.clock(), this.retentionSeconds)) {
        report.skipped.push(userId);
        continue;
      }
      try {
        await this.remove(userId);
        report.deleted.push(userId);
        this.logger?.info(`Expired sandbox removed: ${userId}`);
      } catch (error) {
        report.failed.push(userId);
        this.logger?.warn(`Failed to remove expired sandbox ${userId}, will retry next sweep`, {
          error,
        });
      }
    }

    if (expired.length > 0) {
      this.logger?.info('Expiry sweep finished', {
        deleted: report.deleted.length,
        failed: report.failed.length,
        skipped: report.skipped.length,
      });
    }
    return report;
  }
}
