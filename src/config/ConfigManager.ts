/**
 * Configuration Manager
 * Merges command-line flags over environment variables and validates the result
 */
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { logger, setLogLevel } from '../core/Logger.js';
import { ConfigError } from '../core/errors.js';
import { appConfigSchema, type AppConfig } from './schema.js';

/**
 * Values given on the command line; anything unset falls back to the environment
 */
export type ConfigOverrides = {
  apiKey?: string;
  record?: string;
  interval?: string;
  dryRun?: boolean;
  failFast?: boolean;
  ipLookupUrl?: string;
  publicIp?: string;
  apiUrl?: string;
  timeout?: string;
  metricsPort?: string;
  metricsHost?: string;
  logLevel?: string;
};

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  /** Directory holding Docker secrets */
  secretsDir?: string;
}

export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretsDir: string;
  private readonly _app: AppConfig;

  constructor(overrides: ConfigOverrides = {}, sources: ConfigSources = {}) {
    this.env = sources.env ?? process.env;
    this.secretsDir = sources.secretsDir ?? '/run/secrets';

    // Raw strings; the schema coerces and validates them
    const input = {
      apiKey: overrides.apiKey ?? this.getSecret('DREAMHOST_API_KEY'),
      record: overrides.record ?? this.getEnv('DNS_RECORD'),
      intervalMs: overrides.interval ?? this.getEnv('UPDATE_INTERVAL'),
      dryRun: overrides.dryRun ?? this.getEnvBool('DRY_RUN', false),
      failFast: overrides.failFast ?? this.getEnvBool('FAIL_FAST', true),
      ipLookupUrl: overrides.ipLookupUrl ?? this.getEnv('IP_LOOKUP_URL'),
      publicIp: overrides.publicIp ?? this.getEnv('PUBLIC_IP'),
      apiUrl: overrides.apiUrl ?? this.getEnv('DREAMHOST_API_URL'),
      timeoutMs: overrides.timeout ?? this.getEnv('REQUEST_TIMEOUT'),
      metricsPort: overrides.metricsPort ?? this.getEnv('METRICS_PORT'),
      metricsHost: overrides.metricsHost ?? this.getEnv('METRICS_HOST'),
      logLevel: overrides.logLevel ?? this.getEnv('LOG_LEVEL'),
    };

    const result = appConfigSchema.safeParse(input);
    if (!result.success) {
      throw ConfigError.fromIssues(
        result.error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }

    this._app = result.data;
    setLogLevel(this._app.logLevel);

    logger.debug(
      {
        record: this._app.record,
        interval: this._app.intervalMs,
        dryRun: this._app.dryRun,
        ipLookupUrl: this._app.publicIp ? undefined : this._app.ipLookupUrl,
      },
      'Configuration loaded'
    );
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  /**
   * Read environment variable; empty counts as unset
   */
  private getEnv(key: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value === '' ? undefined : value;
  }

  /**
   * Read environment variable as boolean
   */
  private getEnvBool(key: string, defaultValue: boolean): boolean {
    const value = this.getEnv(key);
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }

  /**
   * Read secret from file (Docker secrets support) or environment
   */
  private getSecret(key: string): string | undefined {
    const secretPath = join(this.secretsDir, key.toLowerCase());
    if (existsSync(secretPath)) {
      try {
        return readFileSync(secretPath, 'utf-8').trim();
      } catch (error) {
        logger.warn({ key, error }, 'Failed to read Docker secret');
      }
    }

    return this.getEnv(key);
  }
}
