/**
 * Tick sources drive the Scheduler's repeat loop
 */

export interface TickSource {
  /**
   * Wait for the next tick. Resolves true when it fires, false once stopped.
   */
  next(): Promise<boolean>;

  /**
   * Stop ticking; a pending next() resolves false
   */
  stop(): void;
}

/** Longest delay setTimeout honours; anything above fires after 1 ms */
export const MAX_TICK_INTERVAL_MS = 2_147_483_647;

/**
 * Fixed-rate ticks aligned to construction time.
 * A tick that falls due while the caller is busy is dropped, never queued.
 */
export class IntervalTickSource implements TickSource {
  private readonly startedAt: number;
  private timer: NodeJS.Timeout | null = null;
  private pending: ((fired: boolean) => void) | null = null;
  private stopped: boolean = false;

  constructor(private readonly intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Tick interval must be a positive number of milliseconds, got ${intervalMs}`);
    }
    if (intervalMs > MAX_TICK_INTERVAL_MS) {
      throw new Error(`Tick interval must not exceed ${MAX_TICK_INTERVAL_MS} ms, got ${intervalMs}`);
    }
    this.startedAt = Date.now();
  }

  next(): Promise<boolean> {
    if (this.stopped) {
      return Promise.resolve(false);
    }

    const elapsed = Date.now() - this.startedAt;
    const delay = this.intervalMs - (elapsed % this.intervalMs);

    return new Promise<boolean>((resolve) => {
      this.pending = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.pending = null;
        resolve(true);
      }, delay);
    });
  }

  stop(): void {
    this.stopped = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const pending = this.pending;
    this.pending = null;
    pending?.(false);
  }
}
