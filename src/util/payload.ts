import type { z } from 'zod';
import { HttpPayloadError } from './http.js';

/**
 * Validate a decoded JSON payload against a schema, failing with
 * HttpPayloadError so callers classify it like any other bad response.
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown, url: string): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new HttpPayloadError(`Unexpected response shape from ${url}: ${issues}`, url, { cause: result.error });
  }
  return result.data;
}
