/**
 * Logger formatting tests
 */
import { describe, it, expect, vi } from 'vitest';
import { Writable } from 'stream';
import { createLogger, formatContext } from '../../../src/core/Logger.js';

function captureLogger(pretty: boolean) {
  const chunks: string[] = [];
  const destination = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });

  return {
    log: createLogger({ level: 'info', pretty, destination }),
    output: () => chunks.join(''),
  };
}

describe('formatContext', () => {
  it('should return an empty string without context', () => {
    expect(formatContext({ level: 'info', msg: 'hello' }, ['level', 'msg'])).toBe('');
  });

  it('should list DNS fields first', () => {
    const log = { count: 3, value: '203.0.113.7', record: 'home.example.com' };

    expect(formatContext(log, [])).toBe(' (record=home.example.com, value=203.0.113.7, count=3)');
  });

  it('should show at most five fields', () => {
    const log = { a: 1, b: 2, c: 3, d: 4, e: 5, f: 6 };

    expect(formatContext(log, [])).toBe(' (a=1, b=2, c=3, d=4, e=5)');
  });

  it('should summarise arrays and objects', () => {
    const log = { issues: [1, 2, 3, 4], config: { a: 1, b: 2 } };

    expect(formatContext(log, [])).toBe(' (issues=4 items, config={2 fields})');
  });

  it('should truncate long strings', () => {
    const log = { reason: 'x'.repeat(45) };

    expect(formatContext(log, [])).toBe(` (reason=${'x'.repeat(40)}...)`);
  });

  it('should skip empty values', () => {
    expect(formatContext({ record: 'home.example.com', zone: undefined }, [])).toBe(' (record=home.example.com)');
  });
});

describe('createLogger', () => {
  it('should print the DNS record inline, not as the machine name', async () => {
    const { log, output } = captureLogger(true);

    log.info({ record: 'home.example.com', value: '203.0.113.7' }, 'A record created');

    await vi.waitFor(() => expect(output()).toContain('A record created'));
    expect(output()).toContain('A record created (record=home.example.com, value=203.0.113.7)');
    expect(output()).not.toContain('(on home.example.com)');
  });

  it('should write JSON lines with the app binding and a redacted key', async () => {
    const { log, output } = captureLogger(false);

    log.info({ record: 'home.example.com', apiKey: 'test-key' }, 'Configuration loaded');

    await vi.waitFor(() => expect(output()).toContain('Configuration loaded'));
    const line: unknown = JSON.parse(output());
    expect(line).toMatchObject({
      level: 'info',
      app: 'dreamdns',
      record: 'home.example.com',
      apiKey: '[redacted]',
      msg: 'Configuration loaded',
    });
    expect(line).not.toHaveProperty('hostname');
  });
});
