/**
 * Command-line parsing tests
 */
import { describe, it, expect } from 'vitest';
import { createProgram, parseCliArgs } from '../../src/cli.js';

describe('parseCliArgs', () => {
  it('should return nothing when no flags are given', () => {
    expect(parseCliArgs([])).toEqual({});
  });

  it('should read short flags', () => {
    expect(parseCliArgs(['-k', 'test-key', '-r', 'home.example.com', '-i', '5m', '-n'])).toEqual({
      apiKey: 'test-key',
      record: 'home.example.com',
      interval: '5m',
      dryRun: true,
    });
  });

  it('should read long flags as strings', () => {
    const overrides = parseCliArgs([
      '--record',
      'home.example.com',
      '--public-ip',
      '203.0.113.7',
      '--timeout',
      '2500',
      '--metrics-port',
      '9100',
      '--metrics-host',
      '127.0.0.1',
      '--log-level',
      'debug',
    ]);

    expect(overrides).toEqual({
      record: 'home.example.com',
      publicIp: '203.0.113.7',
      timeout: '2500',
      metricsPort: '9100',
      metricsHost: '127.0.0.1',
      logLevel: 'debug',
    });
  });

  it('should leave failFast unset unless a flag names it', () => {
    expect(parseCliArgs(['-r', 'home.example.com']).failFast).toBeUndefined();
    expect(parseCliArgs(['--fail-fast']).failFast).toBe(true);
    expect(parseCliArgs(['--no-fail-fast']).failFast).toBe(false);
  });

  it('should read endpoint overrides', () => {
    expect(
      parseCliArgs(['--ip-lookup-url', 'https://ip.example.net/', '--api-url', 'http://127.0.0.1:8080/'])
    ).toEqual({
      ipLookupUrl: 'https://ip.example.net/',
      apiUrl: 'http://127.0.0.1:8080/',
    });
  });
});

describe('createProgram', () => {
  it('should name the command', () => {
    expect(createProgram().name()).toBe('dreamdns-updater');
  });
});
