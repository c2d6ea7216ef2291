/**
 * Main Application Orchestrator
 * Wires resolver, provider and scheduler from configuration and owns process lifecycle
 */
import type { Server } from 'http';
import { logger, symbols } from './Logger.js';
import type { ConfigManager } from '../config/ConfigManager.js';
import { DreamhostProvider } from '../providers/dreamhost/DreamhostProvider.js';
import type { RecordStore } from '../providers/base/RecordStore.js';
import { HttpIPResolver, StaticIPResolver, type IPResolver } from '../services/PublicIPResolver.js';
import { Reconciler } from '../services/Reconciler.js';
import { ReconcileStatus } from '../services/ReconcileStatus.js';
import { Scheduler } from '../services/Scheduler.js';
import type { TickSource } from '../services/TickSource.js';
import { createStatusApp, startServer, stopServer } from '../app.js';
import type { ReconcileOutcome } from '../types/index.js';

export interface ApplicationOptions {
  resolver?: IPResolver;
  store?: RecordStore;
  tickSource?: TickSource;
  /** Leave process signal handlers alone */
  skipSignalHandlers?: boolean;
}

export class Application {
  private readonly scheduler: Scheduler;
  private readonly status: ReconcileStatus;
  private server: Server | null = null;
  private isRunning: boolean = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(
    private readonly config: ConfigManager,
    private readonly options: ApplicationOptions = {}
  ) {
    const { app } = config;

    const resolver =
      options.resolver ??
      (app.publicIp
        ? new StaticIPResolver(app.publicIp)
        : new HttpIPResolver({ url: app.ipLookupUrl, timeoutMs: app.timeoutMs }));

    const store =
      options.store ??
      new DreamhostProvider(
        { apiKey: app.apiKey },
        { apiUrl: app.apiUrl, timeoutMs: app.timeoutMs, dryRun: app.dryRun }
      );

    this.status = new ReconcileStatus();
    this.scheduler = new Scheduler(new Reconciler(resolver, store), {
      hostname: app.record,
      intervalMs: app.intervalMs,
      failFast: app.failFast,
      tickSource: options.tickSource,
      observer: this.status,
    });
  }

  /**
   * Start the application.
   * Single-shot: resolves with the cycle's outcome. Interval mode: resolves with null once the loop runs.
   */
  async start(): Promise<ReconcileOutcome | null> {
    const { app } = this.config;

    if (app.dryRun) {
      logger.warn(`${symbols.dryRun} Dry run: no DNS records will be changed`);
    }

    if (this.scheduler.mode === 'single-shot') {
      return this.scheduler.runOnce();
    }

    if (this.isRunning) {
      logger.warn('Application already running');
      return null;
    }

    logger.info({ record: app.record, interval: app.intervalMs }, `${symbols.startup} Starting DNS updater`);

    if (app.metricsPort > 0) {
      this.server = await startServer(createStatusApp(this.status), app.metricsPort, app.metricsHost);
    }

    try {
      await this.scheduler.start();
    } catch (error) {
      await this.closeServer();
      throw error;
    }

    if (!this.options.skipSignalHandlers) {
      this.setupShutdownHandlers();
    }

    this.isRunning = true;
    return null;
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      if (this.shutdownPromise) {
        logger.info('Shutdown already in progress');
        return this.shutdownPromise;
      }

      logger.info({ signal }, 'Shutdown signal received');
      this.shutdownPromise = this.shutdown(signal);
      await this.shutdownPromise;
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  }

  /**
   * Shutdown the application
   */
  async shutdown(reason: string = 'manual'): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    logger.info({ reason }, 'Shutting down DNS updater');

    try {
      await this.scheduler.stop();
      await this.closeServer();
      this.isRunning = false;
      logger.info('Shutdown complete');
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      throw error;
    }
  }

  private async closeServer(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      await stopServer(server);
    }
  }

  get running(): boolean {
    return this.isRunning;
  }

  get reconcileStatus(): ReconcileStatus {
    return this.status;
  }
}

export function createApplication(config: ConfigManager, options?: ApplicationOptions): Application {
  return new Application(config, options);
}
