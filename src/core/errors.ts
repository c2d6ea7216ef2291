/**
 * Error taxonomy
 *
 * Every failure a reconciliation cycle can produce is one of these classes,
 * so callers can branch on `instanceof` instead of parsing messages.
 */

/**
 * Missing or invalid required input. Always fatal, raised before any network call.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: Array<{ field: string; message: string }> = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromIssues(issues: Array<{ field: string; message: string }>): ConfigError {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    return new ConfigError(`Invalid configuration: ${summary}`, issues);
  }
}

export type ResolveErrorKind = 'InvalidAddress' | 'UnreachableService';

/**
 * The public IP lookup failed
 */
export class ResolveError extends Error {
  constructor(
    public readonly kind: ResolveErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResolveError';
  }

  static invalidAddress(received: string): ResolveError {
    return new ResolveError('InvalidAddress', `Lookup service returned an invalid IPv4 address: "${received}"`);
  }

  static unreachable(url: string, cause: unknown): ResolveError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ResolveError('UnreachableService', `Could not reach IP lookup service ${url}: ${detail}`, { cause });
  }
}

/**
 * The provider answered, and said no
 */
export class ProviderError extends Error {
  constructor(
    public readonly code: string,
    public readonly reason: string
  ) {
    super(`Provider rejected the request: ${reason}`);
    this.name = 'ProviderError';
  }

  /** True when the provider reports the record already exists */
  get isAlreadyExists(): boolean {
    return this.code.startsWith('record_already_exists');
  }
}

/**
 * The provider could not be reached, or did not answer in time
 */
export class ProviderUnreachableError extends Error {
  constructor(
    public readonly command: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not reach provider for ${command}: ${detail}`, { cause });
    this.name = 'ProviderUnreachableError';
  }
}

/**
 * The provider answered with something that does not match its documented schema
 */
export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export type ReconcileStage = 'ResolveFailed' | 'ListFailed' | 'DeleteFailed' | 'CreateFailed';

/**
 * A reconciliation cycle failed at `stage`
 */
export class ReconcileError extends Error {
  /** Provider-supplied reason when the cause carries one */
  public readonly reason?: string;

  constructor(
    public readonly stage: ReconcileStage,
    public readonly hostname: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} for ${hostname}: ${detail}`, { cause });
    this.name = 'ReconcileError';
    if (cause instanceof ProviderError) {
      this.reason = cause.reason;
    }
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
