/**
 * Record Store contract
 * Base class for DNS provider clients that list, create and delete address records
 */
import { isIPv4 } from 'net';
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../../core/Logger.js';
import type { AddressRecord, ProviderRecord } from '../../types/index.js';

export interface RecordStore {
  /** When set, create/delete only report intent */
  readonly dryRun: boolean;

  /**
   * List every record of every type, in provider order
   */
  listRecords(): Promise<ProviderRecord[]>;

  /**
   * Create an address record
   */
  createRecord(hostname: string, value: string): Promise<void>;

  /**
   * Remove the specific (hostname, value) address record
   */
  deleteRecord(hostname: string, value: string): Promise<void>;
}

export interface RecordStoreOptions {
  dryRun?: boolean;
}

/**
 * Compare DNS names the way resolvers do: case-insensitive, trailing dot optional
 */
export function hostnamesEqual(a: string, b: string): boolean {
  return normalizeHostname(a) === normalizeHostname(b);
}

export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Abstract provider base class.
 * Subclasses implement the network calls, this class owns validation and dry-run.
 */
export abstract class RecordStoreProvider implements RecordStore {
  protected logger: Logger;
  readonly dryRun: boolean;

  constructor(providerName: string, options: RecordStoreOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.logger = createChildLogger({ service: 'RecordStore', provider: providerName });
  }

  abstract listRecords(): Promise<ProviderRecord[]>;

  /**
   * Issue the create request
   */
  protected abstract addRecord(record: AddressRecord): Promise<void>;

  /**
   * Issue the delete request
   */
  protected abstract removeRecord(record: AddressRecord): Promise<void>;

  async createRecord(hostname: string, value: string): Promise<void> {
    const record: AddressRecord = { kind: 'A', hostname, value };
    this.validateRecord(record);

    if (this.dryRun) {
      this.logger.info({ record: hostname, value }, `${symbols.dryRun} Dry run: would create A record`);
      return;
    }

    await this.addRecord(record);
    this.logger.info({ record: hostname, value }, 'A record created');
  }

  async deleteRecord(hostname: string, value: string): Promise<void> {
    const record: AddressRecord = { kind: 'A', hostname, value };
    this.validateRecord(record);

    if (this.dryRun) {
      this.logger.info({ record: hostname, value }, `${symbols.dryRun} Dry run: would remove A record`);
      return;
    }

    await this.removeRecord(record);
    this.logger.info({ record: hostname, value }, 'A record removed');
  }

  /**
   * Validate a record before it is sent anywhere
   */
  validateRecord(record: AddressRecord): void {
    if (!record.hostname.trim()) {
      throw new Error('Record hostname is required');
    }

    if (!record.value) {
      throw new Error('Record value is required');
    }

    if (!isIPv4(record.value)) {
      throw new Error(`Invalid IPv4 address: ${record.value}`);
    }
  }
}
