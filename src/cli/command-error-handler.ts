import chalk from 'chalk';
import { ConfigError, TransportError } from '../errors.js';

export const EXIT_OK = 0;
export const EXIT_CONFIG = 1;
export const EXIT_TRANSPORT = 2;
export const EXIT_FAILURE = 1;

/**
 * Exit code for an error that escaped a command action.
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigError) return EXIT_CONFIG;
  if (err instanceof TransportError) return EXIT_TRANSPORT;
  return EXIT_FAILURE;
}

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ConfigError) {
    console.error(chalk.red(`Configuration error: ${err.message}`));
  } else if (err instanceof TransportError) {
    console.error(chalk.red(`Transport error: ${err.message}`));
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
  }
  process.exit(exitCodeFor(err));
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
