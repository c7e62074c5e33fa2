import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { applyOverrides, loadConfig, redactConfig } from '../config/loader.js';
import { DutyService } from '../core/service.js';
import type { LogLevel } from '../logging/events.js';
import { Logger } from '../logging/logger.js';
import { withCommandHandler } from './command-error-handler.js';

export interface CliOptions {
  config: string;
  host?: string;
  port?: number;
  logLevel?: LogLevel;
  check?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${LOG_LEVELS.join(', ')}.`);
  }
  return value;
}

/**
 * Load the config and either print it (`--check`) or run the service until
 * it is signalled.
 */
export async function runBot(opts: CliOptions, extra: readonly string[]): Promise<void> {
  let config = await loadConfig(opts.config);
  config = applyOverrides(config, { host: opts.host, port: opts.port, logLevel: opts.logLevel });

  if (opts.check) {
    console.log(chalk.green('✓ Configuration is valid'));
    console.log(JSON.stringify(redactConfig(config), null, 2));
    return;
  }

  const logger = new Logger({
    source: 'dutyscdp-bot',
    level: config.logging.level,
    logDir: config.logging.dir,
  });
  if (extra.length > 0) {
    logger.info(`Ignoring extra arguments: ${extra.join(' ')}`);
  }

  const service = new DutyService(config, logger);
  await service.run();
}

export function createProgram(action: (opts: CliOptions, extra: readonly string[]) => Promise<void> = runBot): Command {
  const program = new Command();

  program
    .name('dutyscdp-bot')
    .description('On-call aggregation and change-notification service')
    .version('0.1.0')
    .argument('[extra...]', 'Reserved for future use; logged and ignored')
    .option('-c, --config <path>', 'Path to config.toml', 'config.toml')
    .option('--host <host>', 'Override: listen address')
    .option('-p, --port <n>', 'Override: listen port', parsePort)
    .addOption(new Option('--log-level <level>', 'Override: log level').argParser(parseLogLevel))
    .option('--check', 'Validate the configuration, print it with secrets redacted and exit')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(
      withCommandHandler(async (extra: string[], opts: CliOptions) => {
        await action(opts, extra);
      }),
    );

  return program;
}
