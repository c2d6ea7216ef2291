/**
 * Core type definitions
 */

// The only record kind this service manages
export type AddressRecordKind = 'A';

export interface AddressRecord {
  kind: AddressRecordKind;
  hostname: string;
  value: string;
}

/**
 * A record as listed by the provider. Any type may appear here,
 * only `A` records take part in matching.
 */
export interface ProviderRecord {
  type: string;
  hostname: string;
  value: string;
  zone?: string;
  editable?: boolean;
}

export interface DesiredState {
  readonly hostname: string;
  readonly address: string;
}

export type ReconcileOutcome =
  | { action: 'noop'; hostname: string; value: string; dryRun: boolean }
  | { action: 'created'; hostname: string; value: string; dryRun: boolean }
  | { action: 'replaced'; hostname: string; oldValue: string; value: string; dryRun: boolean };
