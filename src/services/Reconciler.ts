/**
 * Reconciler
 * Converges the provider's A record for one hostname onto our public IP
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { ReconcileError } from '../core/errors.js';
import { hostnamesEqual, type RecordStore } from '../providers/base/RecordStore.js';
import type { IPResolver } from './PublicIPResolver.js';
import type { DesiredState, ProviderRecord, ReconcileOutcome } from '../types/index.js';

/**
 * First A record for `hostname`, in the order the provider returned them
 */
export function findAddressRecord(records: ProviderRecord[], hostname: string): ProviderRecord | undefined {
  return records.find((record) => record.type === 'A' && hostnamesEqual(record.hostname, hostname));
}

export class Reconciler {
  private logger: Logger;

  constructor(
    private readonly resolver: IPResolver,
    private readonly store: RecordStore
  ) {
    this.logger = createChildLogger({ service: 'Reconciler' });
  }

  async reconcile(hostname: string): Promise<ReconcileOutcome> {
    let address: string;
    try {
      address = await this.resolver.resolve();
    } catch (error) {
      throw new ReconcileError('ResolveFailed', hostname, error);
    }

    const desired: DesiredState = Object.freeze({ hostname, address });
    this.logger.info({ record: hostname, address }, `${symbols.ip} Current public IP`);

    let records: ProviderRecord[];
    try {
      records = await this.store.listRecords();
    } catch (error) {
      throw new ReconcileError('ListFailed', hostname, error);
    }

    const dryRun = this.store.dryRun;
    const existing = findAddressRecord(records, desired.hostname);

    if (!existing) {
      this.logger.info({ record: hostname, value: desired.address }, 'No A record found, creating');
      await this.create(desired);
      return { action: 'created', hostname, value: desired.address, dryRun };
    }

    if (existing.value === desired.address) {
      this.logger.info({ record: hostname, value: existing.value }, `${symbols.success} A record already points at our public IP`);
      return { action: 'noop', hostname, value: existing.value, dryRun };
    }

    // The provider refuses two A values for one name, so the old one goes first
    this.logger.info({ record: hostname, oldValue: existing.value, value: desired.address }, `${symbols.sync} Replacing stale A record`);

    try {
      await this.store.deleteRecord(existing.hostname, existing.value);
    } catch (error) {
      throw new ReconcileError('DeleteFailed', hostname, error);
    }

    try {
      await this.create(desired);
    } catch (error) {
      this.logger.error(
        { record: hostname, oldValue: existing.value, value: desired.address },
        'Old A record removed but the new one could not be created; hostname has no A record until the next cycle'
      );
      throw error;
    }

    return { action: 'replaced', hostname, oldValue: existing.value, value: desired.address, dryRun };
  }

  private async create(desired: DesiredState): Promise<void> {
    try {
      await this.store.createRecord(desired.hostname, desired.address);
    } catch (error) {
      throw new ReconcileError('CreateFailed', desired.hostname, error);
    }
  }
}
