import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Logger } from 'winston';
import {
  errnoCode,
  InvalidRequestError,
  SandboxExistsError,
  SandboxNotFoundError,
} from './ErrorHandling.js';
import type { SandboxRecord } from './types.js';

export const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Reserved subdirectory of every sandbox root that receives installed packages */
export const PACKAGES_DIR = '.site-packages';

const MetadataSchema = z.object({
  userId: z.string().regex(USER_ID_PATTERN),
  createdAt: z.number(),
  lastActivityAt: z.number(),
  sizeBytes: z.number().nonnegative().default(0),
});

type Metadata = z.infer<typeof MetadataSchema>;

export interface SandboxRegistryOptions {
  baseDir: string;
  logger?: Logger;
  clock?: () => number;
}

function isMissing(error: unknown): boolean {
  return errnoCode(error) === 'ENOENT';
}

/**
 * Approximate disk usage of a directory tree. Symlinks are counted, not followed.
 */
export async function measureDirectorySize(dir: string): Promise<number> {
  let total = 0;
  const pending = [dir];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(current, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) continue; // removed while walking
      throw error;
    }

    for (const entry of entries) {
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
        continue;
      }
      try {
        const stat = await fs.promises.lstat(entryPath);
        total += stat.size;
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }
  }

  return total;
}

/**
 * Owns the set of known sandboxes. Metadata lives in `<baseDir>/registry`, outside
 * every sandbox root, and is written durably before each mutating call returns.
 */
export class SandboxRegistry {
  private readonly records = new Map<string, SandboxRecord>();
  private readonly sandboxesDir: string;
  private readonly metadataDir: string;
  private readonly logger?: Logger;
  private readonly clock: () => number;

  constructor(options: SandboxRegistryOptions) {
    const baseDir = path.resolve(options.baseDir);
    this.sandboxesDir = path.join(baseDir, 'sandboxes');
    this.metadataDir = path.join(baseDir, 'registry');
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Read persisted metadata and reconcile it with the sandbox directories on disk
   */
  load(): void {
    fs.mkdirSync(this.sandboxesDir, { recursive: true });
    fs.mkdirSync(this.metadataDir, { recursive: true });
    this.records.clear();

    for (const file of fs.readdirSync(this.metadataDir)) {
      if (!file.endsWith('.json')) continue;
      const userId = file.slice(0, -'.json'.length);
      const metadataPath = path.join(this.metadataDir, file);
      if (!USER_ID_PATTERN.test(userId)) {
        this.logger?.warn(`Ignoring metadata file with an invalid user id: ${file}`);
        continue;
      }

      const rootDir = this.rootFor(userId);
      if (!fs.existsSync(rootDir)) {
        this.logger?.warn(`Dropping metadata without sandbox directory: ${userId}`);
        fs.rmSync(metadataPath, { force: true });
        continue;
      }

      const metadata = this.readMetadata(metadataPath, userId);
      if (metadata) {
        this.records.set(userId, { ...metadata, rootDir });
        continue;
      }

      const record = this.rebuildRecord(userId, rootDir);
      this.logger?.warn(`Rebuilt unreadable sandbox metadata for user ${userId}`);
      this.persist(record);
      this.records.set(userId, record);
    }

    for (const entry of fs.readdirSync(this.sandboxesDir, { withFileTypes: true })) {
      if (entry.isDirectory() && !this.records.has(entry.name)) {
        this.logger?.warn(`Removing orphaned sandbox directory: ${entry.name}`);
        fs.rmSync(path.join(this.sandboxesDir, entry.name), { recursive: true, force: true });
      }
    }

    this.logger?.info(`Loaded ${this.records.size} sandbox(es) from ${this.metadataDir}`);
  }

  create(userId: string): SandboxRecord {
    this.assertUserId(userId);
    if (this.records.has(userId)) {
      throw new SandboxExistsError(userId);
    }

    const rootDir = this.rootFor(userId);
    if (fs.existsSync(rootDir)) {
      throw new SandboxExistsError(userId, { reason: 'directory already present' });
    }

    fs.mkdirSync(rootDir, { recursive: true });
    fs.mkdirSync(path.join(rootDir, PACKAGES_DIR));

    const now = this.clock();
    const record: SandboxRecord = {
      userId,
      rootDir,
      createdAt: now,
      lastActivityAt: now,
      sizeBytes: 0,
    };

    try {
      this.persist(record);
    } catch (error) {
      fs.rmSync(rootDir, { recursive: true, force: true });
      throw error;
    }

    this.records.set(userId, record);
    this.logger?.info(`Sandbox created for user ${userId}`, { rootDir });
    return { ...record };
  }

  get(userId: string): SandboxRecord {
    const record = this.records.get(userId);
    if (!record) {
      throw new SandboxNotFoundError(userId);
    }
    return { ...record };
  }

  has(userId: string): boolean {
    return this.records.has(userId);
  }

  list(): SandboxRecord[] {
    return Array.from(this.records.values()).map((record) => ({ ...record }));
  }

  touch(userId: string, at: number = this.clock()): void {
    const record = this.require(userId);
    record.lastActivityAt = Math.max(record.lastActivityAt, at);
    this.persist(record);
  }

  updateSize(userId: string, sizeBytes: number): void {
    const record = this.require(userId);
    record.sizeBytes = sizeBytes;
    this.persist(record);
  }

  /**
   * Remove the sandbox root, then its record. A failed removal leaves the record in
   * place so the sandbox stays known and can be deleted again.
   */
  async delete(userId: string): Promise<void> {
    const record = this.require(userId);

    await fs.promises.rm(record.rootDir, { recursive: true, force: true });
    fs.rmSync(this.metadataPathFor(userId), { force: true });
    this.records.delete(userId);

    this.logger?.info(`Sandbox deleted for user ${userId}`);
  }

  isExpired(userId: string, now: number, retentionSeconds: number): boolean {
    const record = this.records.get(userId);
    return record !== undefined && now >= record.lastActivityAt + retentionSeconds * 1000;
  }

  listExpired(now: number, retentionSeconds: number): string[] {
    return Array.from(this.records.keys()).filter((userId) =>
      this.isExpired(userId, now, retentionSeconds),
    );
  }

  private require(userId: string): SandboxRecord {
    const record = this.records.get(userId);
    if (!record) {
      throw new SandboxNotFoundError(userId);
    }
    return record;
  }

  private assertUserId(userId: string): void {
    if (!USER_ID_PATTERN.test(userId)) {
      throw new InvalidRequestError(`Invalid user id: ${JSON.stringify(userId)}`);
    }
  }

  private rootFor(userId: string): string {
    return path.join(this.sandboxesDir, userId);
  }

  private metadataPathFor(userId: string): string {
    return path.join(this.metadataDir, `${userId}.json`);
  }

  private readMetadata(metadataPath: string, userId: string): Metadata | null {
    try {
      const metadata = MetadataSchema.parse(JSON.parse(fs.readFileSync(metadataPath, 'utf-8')));
      return metadata.userId === userId ? metadata : null;
    } catch (error) {
      this.logger?.debug(`Unreadable sandbox metadata: ${metadataPath}`, { error });
      return null;
    }
  }

  /**
   * Record for a sandbox whose metadata was lost. Creation time comes from the root
   * directory; activity restarts now so the files get a full retention window.
   */
  private rebuildRecord(userId: string, rootDir: string): SandboxRecord {
    const stat = fs.statSync(rootDir);
    const now = this.clock();
    const createdAt = Math.floor(stat.birthtimeMs > 0 ? stat.birthtimeMs : stat.mtimeMs);
    return {
      userId,
      rootDir,
      createdAt: Math.min(createdAt, now),
      lastActivityAt: now,
      sizeBytes: 0,
    };
  }

  /**
   * Write metadata through a temp file, fsync it, then rename over the old copy
   */
  private persist(record: SandboxRecord): void {
    const metadata: Metadata = {
      userId: record.userId,
      createdAt: record.createdAt,
      lastActivityAt: record.lastActivityAt,
      sizeBytes: record.sizeBytes,
    };
    const target = this.metadataPathFor(record.userId);
    const temp = `${target}.tmp`;

    const fd = fs.openSync(temp, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(metadata));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(temp, target);
  }
}
