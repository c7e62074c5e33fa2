export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ProviderErrorKind = 'auth' | 'timeout' | 'malformed' | 'unavailable';

/**
 * Base class for failures of a single provider poll. A provider error degrades
 * only that provider's entry; it never aborts a reconciliation cycle.
 */
export abstract class ProviderError extends Error {
  abstract readonly kind: ProviderErrorKind;

  constructor(
    message: string,
    public readonly providerId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class AuthError extends ProviderError {
  readonly kind = 'auth';
  status: number;

  constructor(message: string, providerId: string, status: number) {
    super(message, providerId);
    this.name = 'AuthError';
    this.status = status;
  }
}

export class ProviderTimeoutError extends ProviderError {
  readonly kind = 'timeout';
  timeoutMs: number;

  constructor(message: string, providerId: string, timeoutMs: number) {
    super(message, providerId);
    this.name = 'ProviderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedResponseError extends ProviderError {
  readonly kind = 'malformed';

  constructor(message: string, providerId: string, options?: { cause?: unknown }) {
    super(message, providerId, options);
    this.name = 'MalformedResponseError';
  }
}

export class UnavailableError extends ProviderError {
  readonly kind = 'unavailable';
  status?: number;

  constructor(message: string, providerId: string, status?: number, options?: { cause?: unknown }) {
    super(message, providerId, options);
    this.name = 'UnavailableError';
    this.status = status;
  }
}

export class DispatchError extends Error {
  sink: string;
  transient: boolean;
  status?: number;

  constructor(message: string, sink: string, transient: boolean, status?: number) {
    super(message);
    this.name = 'DispatchError';
    this.sink = sink;
    this.transient = transient;
    this.status = status;
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}
