import type { ProviderErrorKind } from '../errors.js';
import type { DutyState } from '../providers/types.js';

export interface ProviderEntry {
  state: DutyState;
  /** True when the latest poll failed and `state` is the last good one. */
  stale: boolean;
  lastSuccessAt: string;
  consecutiveFailures: number;
  lastError?: { kind: ProviderErrorKind; message: string };
}

/**
 * One published view of every provider. Snapshots are frozen and replaced
 * whole; a provider that never answered has no entry.
 */
export interface AggregatedState {
  observedAt: string;
  cycle: number;
  providers: Readonly<Record<string, Readonly<ProviderEntry>>>;
}

/**
 * A change of the person on duty (or of the roster behind it) for one provider.
 */
export interface Transition {
  providerId: string;
  /** `null` for the first observation of a provider. */
  previous: DutyState | null;
  current: DutyState;
  observedAt: string;
}

export type ReconcilerPhase = 'idle' | 'polling' | 'merging' | 'published' | 'stopped' | 'failed';
