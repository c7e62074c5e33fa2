import type { LoggerLike } from '../logging/logger.js';

export interface RetryOptions<T> {
  /** The operation to retry. */
  fn: (attempt: number) => Promise<T>;
  /** Maximum number of attempts. */
  maxAttempts: number;
  /** Base delay in ms for exponential backoff. */
  baseDelayMs?: number;
  /** Maximum delay in ms. */
  maxDelayMs?: number;
  /** Return false to stop retrying after a permanent failure. */
  shouldRetry?: (error: unknown) => boolean;
  /** Called on each retry. */
  onRetry?: (attempt: number, error: unknown) => void;
  /** Aborting stops the backoff sleep and any further attempt. */
  signal?: AbortSignal;
  /** Description for logging. */
  description?: string;
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  attempts: number;
  error?: unknown;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry executor with exponential backoff and jitter.
 */
export class RetryExecutor {
  constructor(private readonly logger: LoggerLike) {}

  /**
   * Execute an operation with retry logic. Never rejects: the outcome is
   * reported in the result.
   */
  async execute<T>(opts: RetryOptions<T>): Promise<RetryResult<T>> {
    const {
      fn,
      maxAttempts,
      baseDelayMs = 1000,
      maxDelayMs = 30_000,
      shouldRetry = () => true,
      onRetry,
      signal,
      description = 'operation',
    } = opts;

    let lastError: unknown;
    let attempt = 0;
    let stopped = false;

    while (attempt < maxAttempts) {
      attempt++;
      try {
        const result = await fn(attempt);
        return { success: true, result, attempts: attempt };
      } catch (err) {
        lastError = err;

        if (!shouldRetry(err)) {
          this.logger.warn(`${description}: attempt ${attempt} failed permanently`, {
            data: { error: String(err) },
          });
          stopped = true;
          break;
        }

        if (attempt < maxAttempts && !signal?.aborted) {
          // Exponential backoff with jitter
          const delay = Math.min(
            baseDelayMs * Math.pow(2, attempt - 1) + Math.random() * baseDelayMs,
            maxDelayMs,
          );

          this.logger.warn(
            `${description}: attempt ${attempt}/${maxAttempts} failed, retrying in ${Math.round(delay)}ms`,
            { data: { error: String(err) } },
          );

          onRetry?.(attempt, err);
          await sleep(delay, signal);
        }

        if (signal?.aborted) {
          this.logger.warn(`${description}: aborted after ${attempt} attempt(s)`);
          stopped = true;
          break;
        }
      }
    }

    if (!stopped) {
      this.logger.error(`${description}: all ${maxAttempts} attempts exhausted`);
    }
    return { success: false, attempts: attempt, error: lastError };
  }
}
