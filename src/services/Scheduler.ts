/**
 * Scheduler
 * Runs the reconciler once, or once and then on every tick
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { ReconcileError, errorMessage } from '../core/errors.js';
import { IntervalTickSource, type TickSource } from './TickSource.js';
import type { ReconcileOutcome } from '../types/index.js';

export interface ReconcileObserver {
  recordSuccess(outcome: ReconcileOutcome, at: Date): void;
  recordFailure(error: unknown, at: Date): void;
}

export interface ReconcileTarget {
  reconcile(hostname: string): Promise<ReconcileOutcome>;
}

export interface SchedulerOptions {
  hostname: string;
  /** Repeat period; 0 means single-shot */
  intervalMs?: number;
  /** Treat a failed first cycle in interval mode as fatal */
  failFast?: boolean;
  tickSource?: TickSource;
  observer?: ReconcileObserver;
}

export type SchedulerMode = 'single-shot' | 'interval';

export class Scheduler {
  private logger: Logger;
  private ticks: TickSource | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly reconciler: ReconcileTarget,
    private readonly options: SchedulerOptions
  ) {
    this.logger = createChildLogger({ service: 'Scheduler' });
  }

  get mode(): SchedulerMode {
    return (this.options.intervalMs ?? 0) > 0 ? 'interval' : 'single-shot';
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /**
   * Run a single cycle. Errors propagate to the caller.
   */
  async runOnce(): Promise<ReconcileOutcome> {
    return this.cycle();
  }

  /**
   * Run one cycle inline, then keep reconciling on every tick.
   * Resolves once the loop is running; rejects if the first cycle fails and failFast is set.
   */
  async start(): Promise<void> {
    if (this.loop) {
      this.logger.warn('Scheduler already running');
      return;
    }

    const intervalMs = this.options.intervalMs ?? 0;
    if (intervalMs <= 0) {
      throw new Error('Interval mode requires a positive interval');
    }

    const ticks = this.options.tickSource ?? new IntervalTickSource(intervalMs);

    try {
      await this.cycle();
    } catch (error) {
      if (this.options.failFast ?? true) {
        ticks.stop();
        throw error;
      }
      this.logFailure(error);
    }

    this.ticks = ticks;
    this.loop = this.runLoop(ticks);
    this.logger.info({ record: this.options.hostname, interval: intervalMs }, `${symbols.startup} Interval mode started`);
  }

  /**
   * Stop ticking and wait for an in-flight cycle to finish
   */
  async stop(): Promise<void> {
    if (!this.loop) {
      return;
    }

    this.ticks?.stop();
    await this.loop;

    this.ticks = null;
    this.loop = null;
    this.logger.info('Scheduler stopped');
  }

  private async runLoop(ticks: TickSource): Promise<void> {
    while (await ticks.next()) {
      try {
        await this.cycle();
      } catch (error) {
        this.logFailure(error);
      }
    }
  }

  private async cycle(): Promise<ReconcileOutcome> {
    const { hostname, observer } = this.options;

    try {
      const outcome = await this.reconciler.reconcile(hostname);
      observer?.recordSuccess(outcome, new Date());
      this.logger.debug({ record: hostname, action: outcome.action, dryRun: outcome.dryRun }, 'Reconciliation complete');
      return outcome;
    } catch (error) {
      observer?.recordFailure(error, new Date());
      throw error;
    }
  }

  private logFailure(error: unknown): void {
    if (error instanceof ReconcileError) {
      this.logger.error(
        { record: error.hostname, stage: error.stage, reason: error.reason },
        `Reconciliation failed, retrying on next tick: ${error.message}`
      );
      return;
    }

    this.logger.error({ record: this.options.hostname }, `Reconciliation failed, retrying on next tick: ${errorMessage(error)}`);
  }
}
