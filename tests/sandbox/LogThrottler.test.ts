import { createThrottleState, LogThrottler } from '../../src/sandbox/LogThrottler.js';

describe('LogThrottler', () => {
  it('should hold updates until the interval has passed since the job started', () => {
    const throttler = new LogThrottler(3000);
    const state = createThrottleState(1000);

    expect(throttler.shouldEmit(state, 1000)).toBe(false);
    expect(throttler.shouldEmit(state, 3999)).toBe(false);
    expect(throttler.shouldEmit(state, 4000)).toBe(true);
  });

  it('should measure from the last emission once one happened', () => {
    const throttler = new LogThrottler(3000);
    const state = createThrottleState(0);
    throttler.record(state, 3500);

    expect(throttler.shouldEmit(state, 6000)).toBe(false);
    expect(throttler.shouldEmit(state, 6500)).toBe(true);
    expect(state.emitted).toBe(1);
  });

  it('should always let the final update through', () => {
    const throttler = new LogThrottler(3000);
    const state = createThrottleState(0);
    throttler.record(state, 100);

    expect(throttler.shouldEmit(state, 101, true)).toBe(true);
  });

  it('should emit three intermediate updates for 10s of half-second updates', () => {
    const throttler = new LogThrottler(3000);
    const state = createThrottleState(0);
    const emittedAt: number[] = [];

    for (let now = 500; now <= 10_000; now += 500) {
      const final = now === 10_000;
      if (throttler.shouldEmit(state, now, final)) {
        throttler.record(state, now);
        if (!final) {
          emittedAt.push(now);
        }
      }
    }

    expect(emittedAt).toEqual([3000, 6000, 9000]);
    expect(state.emitted).toBe(4);
  });

  it('should default to a three second interval', () => {
    expect(new LogThrottler().intervalMs).toBe(3000);
  });
});
