import { vi } from 'vitest';
import type { LoggerLike } from '../../src/logging/logger.js';

export interface MockLogger extends LoggerLike {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  event: ReturnType<typeof vi.fn>;
}

export function makeLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    event: vi.fn(),
  };
}
