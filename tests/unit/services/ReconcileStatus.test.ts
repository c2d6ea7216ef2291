/**
 * ReconcileStatus unit tests
 */
import { describe, it, expect } from 'vitest';
import { ReconcileStatus } from '../../../src/services/ReconcileStatus.js';
import { ReconcileError } from '../../../src/core/errors.js';

const CREATED = { action: 'created', hostname: 'home.example.com', value: '203.0.113.7', dryRun: false } as const;

describe('ReconcileStatus', () => {
  it('should start empty', () => {
    const status = new ReconcileStatus();

    expect(status.getLastSuccess()).toBeNull();
    expect(status.snapshot()).toEqual({
      lastSuccess: null,
      lastOutcome: null,
      lastFailure: null,
      lastError: null,
      successes: 0,
      failures: 0,
    });
  });

  it('should record the last success', () => {
    const status = new ReconcileStatus();
    const at = new Date('2026-03-01T12:00:00Z');

    status.recordSuccess(CREATED, at);

    expect(status.getLastSuccess()).toBe(at);
    expect(status.snapshot()).toMatchObject({ lastOutcome: CREATED, successes: 1, failures: 0 });
  });

  it('should record failures without touching the last success', () => {
    const status = new ReconcileStatus();
    const success = new Date('2026-03-01T12:00:00Z');
    const failure = new Date('2026-03-01T12:05:00Z');

    status.recordSuccess(CREATED, success);
    status.recordFailure(new ReconcileError('ListFailed', 'home.example.com', new Error('timeout')), failure);

    expect(status.snapshot()).toMatchObject({
      lastSuccess: success,
      lastFailure: failure,
      lastError: 'ListFailed for home.example.com: timeout',
      successes: 1,
      failures: 1,
    });
  });

  it('should expose the last success time and cycle counts as metrics', async () => {
    const status = new ReconcileStatus();

    status.recordSuccess(CREATED, new Date(1_700_000_000_000));
    status.recordSuccess({ ...CREATED, action: 'noop' }, new Date(1_700_000_060_000));
    status.recordFailure(new Error('fetch failed'), new Date(1_700_000_120_000));

    const lines = (await status.metrics()).split('\n');

    expect(lines).toContain('dreamdns_last_success_timestamp_seconds 1700000060');
    expect(lines).toContain('dreamdns_reconcile_total{result="created"} 1');
    expect(lines).toContain('dreamdns_reconcile_total{result="noop"} 1');
    expect(lines).toContain('dreamdns_reconcile_total{result="error"} 1');
  });

  it('should report the Prometheus content type', () => {
    expect(new ReconcileStatus().metricsContentType).toMatch(/^text\/plain/);
  });
});
