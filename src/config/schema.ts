/**
 * Zod schemas for configuration validation
 */
import { isIPv4 } from 'net';
import { z } from 'zod';
import { DEFAULT_DREAMHOST_API_URL } from '../providers/dreamhost/DreamhostProvider.js';
import { DEFAULT_IP_LOOKUP_URL } from '../services/PublicIPResolver.js';
import { MAX_TICK_INTERVAL_MS } from '../services/TickSource.js';

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parse "90s", "5m", "1h30m", "250ms" or a bare millisecond count.
 * Returns null for anything else.
 */
export function parseDuration(input: string): number | null {
  const value = input.trim();

  if (/^\d+$/.test(value)) {
    return Number(value);
  }

  if (!/^(\d+(\.\d+)?(ms|h|m|s))+$/.test(value)) {
    return null;
  }

  let total = 0;
  for (const match of value.matchAll(/(\d+(?:\.\d+)?)(ms|h|m|s)/g)) {
    const amount = Number(match[1]);
    const unit = DURATION_UNITS[match[2] ?? ''];
    if (unit === undefined) {
      return null;
    }
    total += amount * unit;
  }

  return Math.round(total);
}

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export const durationSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const ms = typeof value === 'number' ? value : parseDuration(value);
  if (ms === null || !Number.isFinite(ms) || ms < 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid duration "${value}" (use e.g. 90s, 5m, 1h30m)`,
    });
    return z.NEVER;
  }
  return ms;
});

// RFC 1123 labels, optional trailing dot
const hostnamePattern = /^(?=.{1,253}\.?$)([a-z0-9_]([a-z0-9-]{0,61}[a-z0-9])?\.)*[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?\.?$/i;

export const appConfigSchema = z.object({
  apiKey: z
    .string({ required_error: 'DreamHost API key is required (--api-key or DREAMHOST_API_KEY)' })
    .min(1, 'DreamHost API key is required (--api-key or DREAMHOST_API_KEY)'),
  record: z
    .string({ required_error: 'DNS record is required (--record or DNS_RECORD)' })
    .trim()
    .regex(hostnamePattern, 'DNS record must be a hostname'),
  intervalMs: durationSchema
    .pipe(z.number().max(MAX_TICK_INTERVAL_MS, 'Update interval must not exceed 24 days (2147483647 ms)'))
    .default(0),
  dryRun: z.boolean().default(false),
  failFast: z.boolean().default(true),
  ipLookupUrl: z.string().url().default(DEFAULT_IP_LOOKUP_URL),
  publicIp: z.string().refine((value) => isIPv4(value), 'Public IP must be an IPv4 address').optional(),
  apiUrl: z.string().url().default(DEFAULT_DREAMHOST_API_URL),
  timeoutMs: z.coerce.number().int().min(100).max(60000).default(5000),
  metricsPort: z.coerce.number().int().min(0).max(65535).default(0),
  metricsHost: z.string().min(1).default('0.0.0.0'),
  logLevel: z.string().toLowerCase().pipe(logLevelSchema).default('info'),
});

// Export types inferred from schemas
export type AppConfig = z.infer<typeof appConfigSchema>;
