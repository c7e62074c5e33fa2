import type { ProviderError } from '../errors.js';
import type { ProviderKind } from '../config/loader.js';

export interface Person {
  /** Canonical login (ldap) when a contact matches, else the provider's username. */
  id: string;
  displayName: string;
}

/**
 * Who is on call for one provider, normalized across providers.
 */
export interface DutyState {
  providerId: string;
  /** `null` when the provider reports nobody on call. */
  person: Person | null;
  validFrom?: string;
  validUntil?: string;
  /** Opaque hash of the roster the provider reported; changes with it. */
  sourceRevision: string;
  fetchedAt: string;
}

/**
 * One configured on-call provider. `fetchDuty` performs the outbound calls for
 * a single poll and rejects with a ProviderError subclass.
 */
export interface ProviderClient {
  readonly id: string;
  readonly kind: ProviderKind;
  readonly pollIntervalMs: number;
  readonly timeoutMs: number;
  fetchDuty(signal?: AbortSignal): Promise<DutyState>;
}

export type ProviderOutcome =
  | { providerId: string; ok: true; state: DutyState }
  | { providerId: string; ok: false; error: ProviderError };
