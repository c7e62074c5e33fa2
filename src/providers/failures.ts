import { createHash } from 'node:crypto';
import {
  AuthError,
  MalformedResponseError,
  ProviderError,
  ProviderTimeoutError,
  UnavailableError,
} from '../errors.js';
import { HttpPayloadError, HttpStatusError, HttpTransportError } from '../util/http.js';

/**
 * Translate a low-level failure into the provider error taxonomy.
 */
export function toProviderError(err: unknown, providerId: string, timeoutMs: number): ProviderError {
  if (err instanceof ProviderError) {
    return err;
  }
  if (err instanceof HttpStatusError) {
    if (err.status === 401 || err.status === 403) {
      return new AuthError(`${providerId} rejected the credentials (HTTP ${err.status})`, providerId, err.status);
    }
    return new UnavailableError(`${providerId} answered HTTP ${err.status}`, providerId, err.status, { cause: err });
  }
  if (err instanceof HttpTransportError) {
    if (err.reason === 'timeout') {
      return new ProviderTimeoutError(`${providerId} did not answer within ${timeoutMs}ms`, providerId, timeoutMs);
    }
    return new UnavailableError(err.message, providerId, undefined, { cause: err });
  }
  if (err instanceof HttpPayloadError) {
    return new MalformedResponseError(err.message, providerId, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UnavailableError(`${providerId} poll failed: ${message}`, providerId, undefined, { cause: err });
}

/**
 * Run one provider poll under its own deadline, combined with the caller's
 * signal. Every rejection leaves as a ProviderError.
 */
export async function runProviderCall<T>(
  providerId: string,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const deadline = AbortSignal.timeout(timeoutMs);
  const combined = signal ? AbortSignal.any([deadline, signal]) : deadline;
  try {
    return await fn(combined);
  } catch (err) {
    if (deadline.aborted && !(err instanceof ProviderError)) {
      throw new ProviderTimeoutError(`${providerId} did not answer within ${timeoutMs}ms`, providerId, timeoutMs);
    }
    throw toProviderError(err, providerId, timeoutMs);
  }
}

/**
 * Stable short hash of the parts that identify a roster.
 */
export function revisionOf(parts: readonly string[]): string {
  return createHash('sha256').update(parts.join('\n')).digest('hex').slice(0, 16);
}
