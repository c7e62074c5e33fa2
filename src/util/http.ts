export type HttpTransportReason = 'timeout' | 'network' | 'aborted';

/**
 * The request never produced a response.
 */
export class HttpTransportError extends Error {
  reason: HttpTransportReason;
  url: string;

  constructor(message: string, reason: HttpTransportReason, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpTransportError';
    this.reason = reason;
    this.url = url;
  }
}

/**
 * The server answered with a non-2xx status.
 */
export class HttpStatusError extends Error {
  status: number;
  url: string;
  body: string;

  constructor(status: number, url: string, body: string) {
    super(`HTTP ${status} from ${url}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

/**
 * The response body was not valid JSON.
 */
export class HttpPayloadError extends Error {
  url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpPayloadError';
    this.url = url;
  }
}

export interface HttpRequestOptions {
  method?: string;
  headers?: Record<string, string>;
  /** Serialized as JSON when present. */
  body?: unknown;
  timeoutMs: number;
  /** Caller-side cancellation (cycle deadline, shutdown). */
  signal?: AbortSignal;
}

/**
 * 408, 429 and 5xx are worth retrying; every other 4xx is a caller error.
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Make an HTTP request and return the raw response body.
 *
 * Rejects with HttpTransportError when no response arrives and with
 * HttpStatusError for non-2xx answers.
 */
export async function requestText(url: string, opts: HttpRequestOptions): Promise<string> {
  const timeoutSignal = AbortSignal.timeout(opts.timeoutMs);
  const signal = opts.signal ? AbortSignal.any([timeoutSignal, opts.signal]) : timeoutSignal;

  const headers: Record<string, string> = { Accept: 'application/json', ...opts.headers };
  let body: string | undefined;
  if (opts.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(opts.body);
  }

  let response: Response;
  let text: string;
  try {
    response = await fetch(url, { method: opts.method ?? 'GET', headers, body, signal });
    text = await response.text();
  } catch (err) {
    if (opts.signal?.aborted) {
      throw new HttpTransportError(`Request to ${url} was aborted`, 'aborted', url, { cause: err });
    }
    if (timeoutSignal.aborted) {
      throw new HttpTransportError(`Request to ${url} timed out after ${opts.timeoutMs}ms`, 'timeout', url, {
        cause: err,
      });
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new HttpTransportError(`Failed to reach ${url}: ${detail}`, 'network', url, { cause: err });
  }

  if (!response.ok) {
    throw new HttpStatusError(response.status, url, text);
  }
  return text;
}

/**
 * Make an HTTP request and parse the JSON answer. Resolves to `undefined`
 * for empty bodies; a body that is not JSON rejects with HttpPayloadError.
 */
export async function requestJson(url: string, opts: HttpRequestOptions): Promise<unknown> {
  const text = await requestText(url, opts);
  if (!text.trim()) {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new HttpPayloadError(`Response from ${url} is not valid JSON`, url, { cause: err });
  }
}

/**
 * Join a base URL and an API path without doubling slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * Resolve `${ENV_VAR}` references in strings.
 */
export function resolveEnvRefs(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)\}/g, (_, name: string) => env[name] ?? '');
}
