/**
 * DreamHost DNS Provider Implementation
 * Every command is a GET with query parameters, every answer a JSON envelope
 */
import { z } from 'zod';
import { RecordStoreProvider, hostnamesEqual, type RecordStoreOptions } from '../base/RecordStore.js';
import { ProtocolError, ProviderError, ProviderUnreachableError } from '../../core/errors.js';
import type { AddressRecord, ProviderRecord } from '../../types/index.js';

export const DEFAULT_DREAMHOST_API_URL = 'https://api.dreamhost.com';

export interface DreamhostProviderCredentials {
  apiKey: string;
}

export interface DreamhostProviderOptions extends RecordStoreOptions {
  apiUrl?: string;
  timeoutMs?: number;
}

type DreamhostCommand = 'dns-list_records' | 'dns-add_record' | 'dns-remove_record';

const envelopeSchema = z.object({
  result: z.string(),
  data: z.unknown().optional(),
  reason: z.string().optional(),
});

const dreamhostRecordSchema = z.object({
  record: z.string(),
  type: z.string(),
  value: z.string(),
  zone: z.string().optional(),
  editable: z.union([z.string(), z.number()]).optional(),
});

const recordListSchema = z.array(dreamhostRecordSchema);

type DreamhostRecord = z.infer<typeof dreamhostRecordSchema>;

/**
 * DreamHost DNS Provider
 */
export class DreamhostProvider extends RecordStoreProvider {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;

  constructor(credentials: DreamhostProviderCredentials, options: DreamhostProviderOptions = {}) {
    super('dreamhost', options);

    if (!credentials.apiKey) {
      throw new Error('DreamHost API key is required');
    }

    this.apiKey = credentials.apiKey;
    this.apiUrl = options.apiUrl ?? DEFAULT_DREAMHOST_API_URL;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async listRecords(): Promise<ProviderRecord[]> {
    this.logger.debug('Listing DNS records');

    const data = await this.request('dns-list_records');
    const parsed = recordListSchema.safeParse(data);

    if (!parsed.success) {
      throw new ProtocolError(`dns-list_records: unexpected record list: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const records = parsed.data.map((record) => this.convertFromDreamhost(record));
    this.logger.debug({ count: records.length }, 'DNS records listed');
    return records;
  }

  protected async addRecord(record: AddressRecord): Promise<void> {
    try {
      await this.request('dns-add_record', {
        type: record.kind,
        record: record.hostname,
        value: record.value,
      });
    } catch (error) {
      // Someone else may have written the same record between our list and this add
      if (error instanceof ProviderError && error.isAlreadyExists) {
        const existing = await this.listRecords();
        const present = existing.some(
          (r) => r.type === 'A' && hostnamesEqual(r.hostname, record.hostname) && r.value === record.value
        );

        if (present) {
          this.logger.warn({ record: record.hostname, value: record.value, code: error.code }, 'A record already present');
          return;
        }
      }
      throw error;
    }
  }

  protected async removeRecord(record: AddressRecord): Promise<void> {
    await this.request('dns-remove_record', {
      type: record.kind,
      record: record.hostname,
      value: record.value,
    });
  }

  /**
   * Issue a command and return the `data` payload of a successful answer
   */
  private async request(command: DreamhostCommand, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(this.apiUrl);
    url.search = new URLSearchParams({
      key: this.apiKey,
      format: 'json',
      cmd: command,
      ...params,
    }).toString();

    let text: string;
    try {
      const response = await fetch(url.toString(), {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new ProviderUnreachableError(command, error);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ProtocolError(`${command}: response is not JSON`, { cause: error });
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ProtocolError(`${command}: response has no result field`);
    }

    const { result, data, reason } = envelope.data;
    if (result !== 'success') {
      const code = typeof data === 'string' ? data : result;
      throw new ProviderError(code, reason ?? code);
    }

    return data;
  }

  /**
   * Convert DreamHost record to internal format
   */
  private convertFromDreamhost(record: DreamhostRecord): ProviderRecord {
    return {
      type: record.type,
      hostname: record.record,
      value: record.value,
      zone: record.zone,
      editable: record.editable === undefined ? undefined : String(record.editable) === '1',
    };
  }
}
