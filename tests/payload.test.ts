import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { HttpPayloadError } from '../src/util/http.js';
import { parsePayload } from '../src/util/payload.js';

const Schema = z.object({ id: z.string(), count: z.number() });

describe('parsePayload', () => {
  it('returns the parsed value', () => {
    expect(parsePayload(Schema, { id: 'a', count: 1 }, 'https://api.example/x')).toEqual({ id: 'a', count: 1 });
  });

  it('throws HttpPayloadError listing the first issues', () => {
    let caught: unknown;
    try {
      parsePayload(Schema, { id: 7 }, 'https://api.example/x');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(HttpPayloadError);
    expect(caught).toMatchObject({
      url: 'https://api.example/x',
      message:
        'Unexpected response shape from https://api.example/x: id: Expected string, received number; count: Required',
    });
  });

  it('labels root-level issues', () => {
    expect(() => parsePayload(Schema, 'text', 'https://api.example/x')).toThrow(
      'Unexpected response shape from https://api.example/x: (root): Expected object, received string',
    );
  });
});
