/**
 * Emission bookkeeping for one job's externally visible log updates
 */
export interface ThrottleState {
  startedAt: number;
  lastEmitAt: number | null;
  emitted: number;
}

export function createThrottleState(startedAt: number): ThrottleState {
  return { startedAt, lastEmitAt: null, emitted: 0 };
}

/**
 * Minimum-interval gate for log forwarding. Updates arriving inside the interval are
 * dropped, not queued; the caller sends whatever snapshot is current when the gate
 * opens. The terminal update always passes.
 */
export class LogThrottler {
  constructor(public readonly intervalMs: number = 3000) {}

  shouldEmit(state: ThrottleState, now: number, final: boolean = false): boolean {
    if (final) {
      return true;
    }
    const since = state.lastEmitAt ?? state.startedAt;
    return now - since >= this.intervalMs;
  }

  record(state: ThrottleState, now: number): void {
    state.lastEmitAt = now;
    state.emitted++;
  }
}
