/**
 * Command-line flags
 * Every flag has an environment variable fallback handled by ConfigManager
 */
import { Command } from 'commander';
import type { ConfigOverrides } from './config/ConfigManager.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  return new Command()
    .name('dreamdns-updater')
    .description("Keep a DreamHost DNS A record pointed at this host's public IP address")
    .version(VERSION)
    .option('-k, --api-key <key>', 'DreamHost API key with DNS read/write permission [DREAMHOST_API_KEY]')
    .option('-r, --record <hostname>', 'A record to check, create or replace [DNS_RECORD]')
    .option('-i, --interval <duration>', 'repeat every duration, e.g. 90s, 5m, 1h; 0 runs once [UPDATE_INTERVAL]')
    .option('-n, --dry-run', 'log the changes that would be made without making them [DRY_RUN]')
    .option('--fail-fast', 'exit when the first cycle fails in interval mode (default) [FAIL_FAST]')
    .option('--no-fail-fast', 'keep running when the first cycle fails')
    .option('--ip-lookup-url <url>', 'service that returns our public IP as plain text [IP_LOOKUP_URL]')
    .option('--public-ip <address>', 'use this address instead of looking it up [PUBLIC_IP]')
    .option('--api-url <url>', 'DreamHost API endpoint [DREAMHOST_API_URL]')
    .option('--timeout <ms>', 'timeout for every outbound request [REQUEST_TIMEOUT]')
    .option('--metrics-port <port>', 'serve /health and /metrics on this port, 0 disables [METRICS_PORT]')
    .option('--metrics-host <host>', 'bind address for the status server [METRICS_HOST]')
    .option('--log-level <level>', 'fatal, error, warn, info, debug or trace [LOG_LEVEL]');
}

/**
 * Parse user arguments (without the node and script entries)
 */
export function parseCliArgs(args: string[], program: Command = createProgram()): ConfigOverrides {
  program.parse(args, { from: 'user' });
  return program.opts<ConfigOverrides>();
}
