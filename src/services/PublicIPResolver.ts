/**
 * Public IP resolution
 * Asks an external lookup service which address our requests come from
 */
import { isIPv4 } from 'net';
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ResolveError } from '../core/errors.js';

export const DEFAULT_IP_LOOKUP_URL = 'http://myexternalip.com/raw';

export interface IPResolver {
  /**
   * Resolve the current public IPv4 address.
   * Rejects with a ResolveError; never retries.
   */
  resolve(): Promise<string>;
}

export interface HttpIPResolverOptions {
  url?: string;
  timeoutMs?: number;
}

export class HttpIPResolver implements IPResolver {
  private readonly logger: Logger;
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: HttpIPResolverOptions = {}) {
    this.url = options.url ?? DEFAULT_IP_LOOKUP_URL;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.logger = createChildLogger({ service: 'IPResolver' });
  }

  async resolve(): Promise<string> {
    let body: string;

    try {
      const response = await fetch(this.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }

      body = await response.text();
    } catch (error) {
      throw ResolveError.unreachable(this.url, error);
    }

    // Lookup services terminate the address with a newline
    const address = body.trim();
    if (!isIPv4(address)) {
      throw ResolveError.invalidAddress(address);
    }

    this.logger.debug({ address }, 'Public IP resolved');
    return address;
  }
}

/**
 * Resolver for a fixed, operator-supplied address
 */
export class StaticIPResolver implements IPResolver {
  constructor(private readonly address: string) {
    if (!isIPv4(address)) {
      throw ResolveError.invalidAddress(address);
    }
  }

  async resolve(): Promise<string> {
    return this.address;
  }
}
