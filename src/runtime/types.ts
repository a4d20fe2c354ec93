import type { Readable, Writable } from 'stream';

/**
 * The parts of a spawned container client process the launchers rely on.
 * `ChildProcessWithoutNullStreams` satisfies it; tests provide in-process fakes.
 */
export interface ContainerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface CommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Handle to the container engine. Constructed once at startup and passed to every
 * component that launches containers.
 */
export interface ContainerRuntime {
  /** Start a container client with the given arguments (no shell) */
  spawn(args: string[]): ContainerProcess;
  /** Run a short runtime command to completion */
  exec(args: string[], timeoutMs?: number): Promise<CommandOutput>;
  isReachable(): Promise<boolean>;
  imageExists(image: string): Promise<boolean>;
  pullImage(image: string): Promise<void>;
  /** Resolve when the image is available locally, pulling it when allowed */
  ensureImage(image: string, options?: { pull?: boolean }): Promise<void>;
  /** Force-remove a container by name; missing containers are not an error */
  removeContainer(name: string): Promise<void>;
}
