import { SandboxBusyError } from './ErrorHandling.js';

export type ExecutionKind = 'run' | 'install';

interface LockState {
  holder: ExecutionKind | 'delete' | null;
  sharedHolders: number;
}

export type Release = () => void;

/**
 * Per-sandbox exclusivity keyed by user id.
 *
 * - execution (run, install): one at a time, fails fast when held
 * - delete: exclusive of everything, including in-flight file operations
 * - shared (file and listing operations): do not exclude each other, but never
 *   overlap an execution, whose code could swap paths under a host-side check
 *
 * Entries are created on first use and dropped by `forget` when the sandbox goes away.
 */
export class SandboxLocks {
  private readonly locks = new Map<string, LockState>();

  acquireExecution(userId: string, kind: ExecutionKind): Release {
    const state = this.stateFor(userId);
    if (state.holder !== null) {
      throw new SandboxBusyError(userId, state.holder);
    }
    if (state.sharedHolders > 0) {
      throw new SandboxBusyError(userId, 'file operation');
    }
    state.holder = kind;
    return this.releaser(() => {
      if (state.holder === kind) {
        state.holder = null;
      }
    });
  }

  acquireDelete(userId: string): Release {
    const state = this.stateFor(userId);
    if (state.holder !== null) {
      throw new SandboxBusyError(userId, state.holder);
    }
    if (state.sharedHolders > 0) {
      throw new SandboxBusyError(userId, 'file operation');
    }
    state.holder = 'delete';
    return this.releaser(() => {
      if (state.holder === 'delete') {
        state.holder = null;
      }
    });
  }

  acquireShared(userId: string): Release {
    const state = this.stateFor(userId);
    if (state.holder !== null) {
      throw new SandboxBusyError(userId, state.holder);
    }
    state.sharedHolders++;
    return this.releaser(() => {
      state.sharedHolders = Math.max(0, state.sharedHolders - 1);
    });
  }

  /** Current exclusive holder, if any */
  heldBy(userId: string): ExecutionKind | 'delete' | null {
    return this.locks.get(userId)?.holder ?? null;
  }

  activeExecutions(userId: string): number {
    const holder = this.heldBy(userId);
    return holder === 'run' || holder === 'install' ? 1 : 0;
  }

  forget(userId: string): void {
    this.locks.delete(userId);
  }

  get size(): number {
    return this.locks.size;
  }

  private stateFor(userId: string): LockState {
    let state = this.locks.get(userId);
    if (!state) {
      state = { holder: null, sharedHolders: 0 };
      this.locks.set(userId, state);
    }
    return state;
  }

  private releaser(release: () => void): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }
}
