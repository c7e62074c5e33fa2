import { describe, it, expect } from 'vitest';
import {
  AuthError,
  MalformedResponseError,
  ProviderTimeoutError,
  UnavailableError,
} from '../src/errors.js';
import { revisionOf, runProviderCall, toProviderError } from '../src/providers/failures.js';
import { HttpPayloadError, HttpStatusError, HttpTransportError } from '../src/util/http.js';

describe('toProviderError', () => {
  it.each([401, 403])('maps HTTP %i to AuthError', (status) => {
    const err = toProviderError(new HttpStatusError(status, 'https://x.example', ''), 'loop', 1000);
    expect(err).toBeInstanceOf(AuthError);
    expect(err.message).toBe(`loop rejected the credentials (HTTP ${status})`);
  });

  it.each([404, 429, 500])('maps HTTP %i to UnavailableError', (status) => {
    const err = toProviderError(new HttpStatusError(status, 'https://x.example', ''), 'loop', 1000);
    expect(err).toBeInstanceOf(UnavailableError);
    expect(err).toMatchObject({ status });
  });

  it('maps a transport timeout to ProviderTimeoutError', () => {
    const err = toProviderError(new HttpTransportError('slow', 'timeout', 'https://x.example'), 'loop', 1000);
    expect(err).toBeInstanceOf(ProviderTimeoutError);
    expect(err.message).toBe('loop did not answer within 1000ms');
  });

  it('maps a network failure to UnavailableError', () => {
    const err = toProviderError(new HttpTransportError('refused', 'network', 'https://x.example'), 'loop', 1000);
    expect(err).toBeInstanceOf(UnavailableError);
    expect(err.message).toBe('refused');
  });

  it('maps a payload error to MalformedResponseError', () => {
    const err = toProviderError(new HttpPayloadError('garbled', 'https://x.example'), 'loop', 1000);
    expect(err).toBeInstanceOf(MalformedResponseError);
  });

  it('passes provider errors through', () => {
    const original = new AuthError('denied', 'loop', 401);
    expect(toProviderError(original, 'loop', 1000)).toBe(original);
  });

  it('wraps anything else as UnavailableError', () => {
    const err = toProviderError('boom', 'oncall', 1000);
    expect(err).toBeInstanceOf(UnavailableError);
    expect(err.message).toBe('oncall poll failed: boom');
  });
});

describe('runProviderCall', () => {
  it('returns the result of the call', async () => {
    await expect(runProviderCall('loop', 1000, undefined, async () => 42)).resolves.toBe(42);
  });

  it('turns a call that outlives its deadline into ProviderTimeoutError', async () => {
    const err = await runProviderCall(
      'loop',
      10,
      undefined,
      (signal) =>
        new Promise((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    ).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderTimeoutError);
  });

  it('passes the caller signal through', async () => {
    const controller = new AbortController();
    const seen = await runProviderCall('loop', 1000, controller.signal, async (signal) => {
      controller.abort();
      return signal.aborted;
    });
    expect(seen).toBe(true);
  });
});

describe('revisionOf', () => {
  it('is a stable 16-character hex digest', () => {
    const rev = revisionOf(['loop', 'primary', 'u1']);
    expect(rev).toMatch(/^[0-9a-f]{16}$/);
    expect(revisionOf(['loop', 'primary', 'u1'])).toBe(rev);
    expect(revisionOf(['loop', 'primary', 'u2'])).not.toBe(rev);
  });
});
