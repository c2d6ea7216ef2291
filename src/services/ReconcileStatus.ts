/**
 * Reconciliation status
 * Written by the Scheduler after every cycle, read by the status endpoints
 */
import { Counter, Gauge, Registry } from 'prom-client';
import { errorMessage } from '../core/errors.js';
import type { ReconcileObserver } from './Scheduler.js';
import type { ReconcileOutcome } from '../types/index.js';

export interface StatusSnapshot {
  lastSuccess: Date | null;
  lastOutcome: ReconcileOutcome | null;
  lastFailure: Date | null;
  lastError: string | null;
  successes: number;
  failures: number;
}

/**
 * Read side, the only thing the HTTP layer sees
 */
export interface StatusReader {
  getLastSuccess(): Date | null;
  snapshot(): StatusSnapshot;
  metrics(): Promise<string>;
  readonly metricsContentType: string;
}

export class ReconcileStatus implements ReconcileObserver, StatusReader {
  private readonly registry: Registry;
  private readonly lastSuccessGauge: Gauge;
  private readonly cycles: Counter<'result'>;
  private state: StatusSnapshot = {
    lastSuccess: null,
    lastOutcome: null,
    lastFailure: null,
    lastError: null,
    successes: 0,
    failures: 0,
  };

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.lastSuccessGauge = new Gauge({
      name: 'dreamdns_last_success_timestamp_seconds',
      help: 'Unix time of the last successful reconciliation',
      registers: [this.registry],
    });

    this.cycles = new Counter({
      name: 'dreamdns_reconcile_total',
      help: 'Reconciliation cycles by result',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });
  }

  recordSuccess(outcome: ReconcileOutcome, at: Date): void {
    this.state = {
      ...this.state,
      lastSuccess: at,
      lastOutcome: outcome,
      successes: this.state.successes + 1,
    };
    this.lastSuccessGauge.set(at.getTime() / 1000);
    this.cycles.inc({ result: outcome.action });
  }

  recordFailure(error: unknown, at: Date): void {
    this.state = {
      ...this.state,
      lastFailure: at,
      lastError: errorMessage(error),
      failures: this.state.failures + 1,
    };
    this.cycles.inc({ result: 'error' });
  }

  getLastSuccess(): Date | null {
    return this.state.lastSuccess;
  }

  snapshot(): StatusSnapshot {
    return { ...this.state };
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get metricsContentType(): string {
    return this.registry.contentType;
  }
}
