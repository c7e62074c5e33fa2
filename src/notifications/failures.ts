import { DispatchError } from '../errors.js';
import { HttpStatusError, HttpTransportError, isTransientStatus } from '../util/http.js';

/**
 * Classify a delivery failure. Timeouts, network errors, 408/429 and 5xx are
 * transient; everything else is permanent.
 */
export function toDispatchError(err: unknown, sink: string): DispatchError {
  if (err instanceof DispatchError) {
    return err;
  }
  if (err instanceof HttpStatusError) {
    return new DispatchError(`${sink}: HTTP ${err.status}`, sink, isTransientStatus(err.status), err.status);
  }
  if (err instanceof HttpTransportError) {
    return new DispatchError(`${sink}: ${err.message}`, sink, err.reason !== 'aborted');
  }
  const message = err instanceof Error ? err.message : String(err);
  return new DispatchError(`${sink}: ${message}`, sink, false);
}
