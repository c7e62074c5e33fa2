import type { RetryPolicy, SinkConfig } from '../config/loader.js';
import type { Transition } from '../core/types.js';

export type { Transition };

/**
 * A delivery target for duty transitions. `deliver` performs one attempt;
 * the dispatcher owns retries.
 */
export interface NotificationSink {
  readonly name: string;
  readonly type: SinkConfig['type'];
  /** Provider ids this sink accepts; every provider when unset. */
  readonly providers?: readonly string[];
  readonly retry: RetryPolicy;
  deliver(transition: Transition, signal: AbortSignal): Promise<void>;
}

export interface DeliveryStats {
  delivered: number;
  failed: number;
  retries: number;
}

export interface SinkDelivery {
  sink: string;
  ok: boolean;
  attempts: number;
  error?: string;
}

export interface DispatchResult {
  providerId: string;
  sourceRevision: string;
  deliveries: SinkDelivery[];
}

/**
 * What the reconciler hands its transitions to.
 */
export interface TransitionSink {
  submit(transitions: readonly Transition[]): void;
}

export type SinkConfigOf<K extends SinkConfig['type']> = Extract<SinkConfig, { type: K }>;
