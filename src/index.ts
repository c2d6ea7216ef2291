#!/usr/bin/env node
/**
 * dreamdns-updater - Entry Point
 *
 * Keeps a DreamHost DNS A record pointed at the public IP of this host
 */
import { ConfigManager } from './config/ConfigManager.js';
import { createApplication, logger, ConfigError, ReconcileError, errorMessage } from './core/index.js';
import { parseCliArgs } from './cli.js';

function reportFatal(error: unknown): void {
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, error.message);
  } else if (error instanceof ReconcileError) {
    logger.fatal({ record: error.hostname, stage: error.stage, reason: error.reason }, error.message);
  } else {
    logger.fatal({ error }, `DNS update failed: ${errorMessage(error)}`);
  }
}

async function main(): Promise<void> {
  const overrides = parseCliArgs(process.argv.slice(2));

  try {
    const config = new ConfigManager(overrides);
    const app = createApplication(config);
    const outcome = await app.start();

    if (outcome) {
      const suffix = outcome.dryRun ? ' (dry run)' : '';
      logger.info({ record: outcome.hostname, action: outcome.action, value: outcome.value }, `DNS record up to date${suffix}`);
    }
  } catch (error) {
    reportFatal(error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
