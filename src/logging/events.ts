/**
 * Typed event definitions for the service's structured logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  provider?: string;
  sink?: string;
  data?: Record<string, unknown>;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
}

// ── Reconciliation events ──

export interface CycleCompletedEvent {
  type: 'cycle-completed';
  cycle: number;
  polled: string[];
  failed: string[];
  transitions: number;
  durationMs: number;
}

export interface ProviderDegradedEvent {
  type: 'provider-degraded';
  providerId: string;
  errorKind: string;
  error: string;
  consecutiveFailures: number;
}

export interface ProviderRecoveredEvent {
  type: 'provider-recovered';
  providerId: string;
  failedPolls: number;
}

// ── Delivery events ──

export interface DutyChangedEvent {
  type: 'duty-changed';
  providerId: string;
  person: string | null;
  previousPerson: string | null;
  sourceRevision: string;
}

export interface DeliveryFailedEvent {
  type: 'delivery-failed';
  providerId: string;
  sink: string;
  attempts: number;
  error: string;
}

export type DutyEvent =
  | CycleCompletedEvent
  | ProviderDegradedEvent
  | ProviderRecoveredEvent
  | DutyChangedEvent
  | DeliveryFailedEvent;
