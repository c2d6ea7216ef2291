/**
 * IntervalTickSource unit tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { IntervalTickSource, MAX_TICK_INTERVAL_MS } from '../../../src/services/TickSource.js';

describe('IntervalTickSource', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function track(promise: Promise<boolean>): { settled: boolean; value: boolean | undefined } {
    const state: { settled: boolean; value: boolean | undefined } = { settled: false, value: undefined };
    void promise.then((value) => {
      state.settled = true;
      state.value = value;
    });
    return state;
  }

  it('should reject a non-positive interval', () => {
    expect(() => new IntervalTickSource(0)).toThrow('Tick interval must be a positive number of milliseconds, got 0');
    expect(() => new IntervalTickSource(Number.NaN)).toThrow('Tick interval must be a positive number');
  });

  it('should reject an interval setTimeout cannot represent', () => {
    expect(() => new IntervalTickSource(2_160_000_000)).toThrow(
      'Tick interval must not exceed 2147483647 ms, got 2160000000'
    );
  });

  it('should wait the full interval at the timer limit', async () => {
    const ticks = new IntervalTickSource(MAX_TICK_INTERVAL_MS);
    const tick = track(ticks.next());

    await vi.advanceTimersByTimeAsync(1000);
    expect(tick.settled).toBe(false);

    ticks.stop();
  });

  it('should fire one interval after construction', async () => {
    const ticks = new IntervalTickSource(1000);
    const tick = track(ticks.next());

    await vi.advanceTimersByTimeAsync(999);
    expect(tick.settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(tick).toEqual({ settled: true, value: true });
  });

  it('should stay aligned to the start time when a cycle runs long', async () => {
    const ticks = new IntervalTickSource(1000);

    // Consumer was busy for 2.5 intervals; the missed ticks are dropped
    await vi.advanceTimersByTimeAsync(2500);
    const tick = track(ticks.next());

    await vi.advanceTimersByTimeAsync(499);
    expect(tick.settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(tick).toEqual({ settled: true, value: true });
  });

  it('should resolve a pending wait with false when stopped', async () => {
    const ticks = new IntervalTickSource(1000);
    const tick = track(ticks.next());

    ticks.stop();
    await vi.advanceTimersByTimeAsync(0);

    expect(tick).toEqual({ settled: true, value: false });
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should return false immediately once stopped', async () => {
    const ticks = new IntervalTickSource(1000);
    ticks.stop();

    await expect(ticks.next()).resolves.toBe(false);
  });
});
