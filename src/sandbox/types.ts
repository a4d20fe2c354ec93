
/**
 * Persistent record of one user's sandbox
 */
export interface SandboxRecord {
  userId: string;
  rootDir: string;
  createdAt: number;
  lastActivityAt: number;
  sizeBytes: number;
}

/**
 * Ceilings applied to every container launched against a sandbox
 */
export interface ResourceLimits {
  cpus: number;
  memoryBytes: number;
  pidsLimit: number;
}

/**
 * One isolated run of user code. Never persisted.
 */
export interface ExecutionRequest {
  code: string;
  /** Working directory relative to the sandbox root ('.' for the root) */
  workdir: string;
  timeoutMs: number;
  limits: ResourceLimits;
}

export type ExecutionStatus = 'completed' | 'timeout' | 'resource_exceeded' | 'cancelled';

export type ExceededResource = 'memory' | 'processes';

export interface ExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  truncated: boolean;
  status: ExecutionStatus;
  resource?: ExceededResource;
  durationMs: number;
}

export interface InstallResult {
  success: boolean;
  exitCode: number | null;
  timedOut: boolean;
  cancelled: boolean;
  finalLog: string;
  packages: string[];
  durationMs: number;
}

export type InstallEvent =
  | { type: 'progress'; log: string; elapsedMs: number }
  | { type: 'complete'; result: InstallResult };

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

export interface DirectoryEntry {
  name: string;
  type: EntryType;
  sizeBytes?: number;
}

export interface DirectoryPage {
  path: string;
  page: number;
  totalPages: number;
  totalEntries: number;
  entries: DirectoryEntry[];
}

export interface HealthStatus {
  runtimeReachable: boolean;
  imagePresent: boolean;
  image: string;
  detail?: string;
}
