import type { ProviderConfig } from '../config/loader.js';
import type { ContactDirectory } from '../contacts/directory.js';
import type { LoggerLike } from '../logging/logger.js';
import { LoopDutyProvider } from './loop-provider.js';
import { OnCallDutyProvider } from './oncall-provider.js';
import type { ProviderClient } from './types.js';

/**
 * Create the client for one configured provider, selected by its `kind`.
 */
export function createProvider(
  config: ProviderConfig,
  directory: ContactDirectory,
  logger: LoggerLike,
): ProviderClient {
  switch (config.kind) {
    case 'loop':
      logger.debug(`Using Loop group ${config.schedule} at ${config.baseUrl}`, { provider: config.id });
      return new LoopDutyProvider(config, directory);

    case 'oncall':
      logger.debug(`Using OnCall schedule "${config.schedule}" at ${config.baseUrl}`, { provider: config.id });
      return new OnCallDutyProvider(config, directory);
  }
}

/**
 * Build every configured provider, keyed by provider id in polling order.
 */
export function createProviders(
  configs: readonly ProviderConfig[],
  directory: ContactDirectory,
  logger: LoggerLike,
): Map<string, ProviderClient> {
  const providers = new Map<string, ProviderClient>();
  for (const config of configs) {
    providers.set(config.id, createProvider(config, directory, logger));
  }
  return providers;
}
