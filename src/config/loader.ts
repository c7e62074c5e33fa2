import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { DutyConfigSchema, type DutyConfigDocument, type SinkSection } from './schema.js';
import { ConfigError } from '../errors.js';
import type { LogLevel } from '../logging/events.js';
import { parseWeekday, type DutyRota, type Weekday } from '../contacts/rota.js';

export type ProviderKind = 'loop' | 'oncall';

interface ProviderSettingsBase {
  /** Lane name used in /duty and /events/{id}; equals the config table name. */
  readonly id: string;
  readonly baseUrl: string;
  /** Secret. Never logged. */
  readonly token: string;
  readonly schedule: string;
  readonly pollIntervalMs: number;
  readonly timeoutMs: number;
}

export interface LoopProviderConfig extends ProviderSettingsBase {
  readonly kind: 'loop';
  readonly team?: string;
  /** Set when `[schedule]` is configured; it then decides who is on duty. */
  readonly rota?: DutyRota;
}

export interface OnCallProviderConfig extends ProviderSettingsBase {
  readonly kind: 'oncall';
}

export type ProviderConfig = LoopProviderConfig | OnCallProviderConfig;

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

interface SinkBase {
  /** `<type>#<position>`, used in logs and delivery counters. */
  readonly name: string;
  readonly providers?: readonly string[];
  readonly retry: RetryPolicy;
  readonly timeoutMs: number;
}

export type SinkConfig =
  | (SinkBase & { readonly type: 'webhook'; readonly url: string })
  | (SinkBase & { readonly type: 'slack'; readonly url: string; readonly channel?: string })
  | (SinkBase & { readonly type: 'loop'; readonly channel: string })
  | (SinkBase & { readonly type: 'loop-group'; readonly group: string; readonly keepUsernames: readonly string[] })
  | (SinkBase & { readonly type: 'log'; readonly file: string });

export interface Contact {
  readonly key: string;
  readonly ldap: string;
  readonly fullName: string;
  readonly aliases: readonly string[];
}

/**
 * Config as consumed by the runtime: camelCase, durations in milliseconds,
 * frozen. Providers are listed in polling order with Loop first.
 */
export interface RuntimeConfig {
  readonly loop: LoopProviderConfig;
  readonly oncall?: OnCallProviderConfig;
  readonly providers: readonly ProviderConfig[];
  readonly server: { readonly host: string; readonly port: number };
  readonly reconciler: {
    readonly cycleMarginMs: number;
    readonly notifyInitial: boolean;
    readonly shutdownGraceMs: number;
  };
  readonly notifications: {
    readonly drainTimeoutMs: number;
    readonly concurrency: number;
    readonly sinks: readonly SinkConfig[];
  };
  readonly contacts: readonly Contact[];
  readonly logging: { readonly level: LogLevel; readonly dir?: string };
}

/**
 * Environment variables that override file values. They apply only to a table
 * present in the file, so an absent [loop] stays an error.
 */
const ENV_OVERRIDES = {
  loop: { token: 'LOOP_TOKEN', url: 'LOOP_URL', schedule: 'LOOP_SCHEDULE', team: 'LOOP_TEAM' },
  oncall: { token: 'ONCALL_TOKEN', url: 'ONCALL_URL', schedule: 'ONCALL_SCHEDULE' },
} as const;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function applyEnvOverrides(
  document: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...document };
  for (const [section, variables] of Object.entries(ENV_OVERRIDES)) {
    const table = result[section];
    if (!isTable(table)) continue;

    const merged: Record<string, unknown> = { ...table };
    for (const [key, name] of Object.entries(variables)) {
      const value = env[name];
      if (value !== undefined && value.trim() !== '') {
        merged[key] = value;
      }
    }
    result[section] = merged;
  }
  return result;
}

function toSinkConfig(section: SinkSection, index: number): SinkConfig {
  const base: SinkBase = {
    name: `${section.type}#${index + 1}`,
    providers: section.providers,
    retry: {
      maxAttempts: section.max_attempts,
      baseDelayMs: section.base_delay_ms,
      maxDelayMs: section.max_delay_ms,
    },
    timeoutMs: section.timeout_seconds * 1000,
  };

  switch (section.type) {
    case 'webhook':
      return { ...base, type: 'webhook', url: section.url };
    case 'slack':
      return { ...base, type: 'slack', url: section.url, channel: section.channel };
    case 'loop':
      return { ...base, type: 'loop', channel: section.channel };
    case 'loop-group':
      return { ...base, type: 'loop-group', group: section.group, keepUsernames: section.keep_usernames };
    case 'log':
      return { ...base, type: 'log', file: section.file };
  }
}

/**
 * Validate a parsed config document and convert it to a RuntimeConfig.
 */
export function buildRuntimeConfig(document: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  if (!isTable(document['loop'])) {
    throw new ConfigError('Invalid config:\n  - loop: the [loop] section is required');
  }

  const result = DutyConfigSchema.safeParse(applyEnvOverrides(document, env));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config:\n${issues}`, result.error);
  }

  return toRuntimeConfig(result.data);
}

function toRota(doc: DutyConfigDocument, contacts: readonly Contact[]): DutyRota | undefined {
  const entries = Object.entries(doc.schedule ?? {});
  if (entries.length === 0) return undefined;

  const byKey = new Map(contacts.map((c) => [c.key, c]));
  const days: Partial<Record<Weekday, Contact>> = {};
  for (const [day, key] of entries) {
    const weekday = parseWeekday(day);
    const contact = byKey.get(key);
    if (weekday && contact) {
      days[weekday] = contact;
    }
  }
  return { timeZone: doc.loop.timezone, days };
}

function toRuntimeConfig(doc: DutyConfigDocument): RuntimeConfig {
  const contacts: Contact[] = Object.entries(doc.contacts).map(([key, contact]) => ({
    key,
    ldap: contact.ldap,
    fullName: contact.full_name,
    aliases: contact.aliases,
  }));

  const loop: LoopProviderConfig = {
    kind: 'loop',
    id: 'loop',
    baseUrl: doc.loop.url,
    token: doc.loop.token,
    schedule: doc.loop.schedule,
    team: doc.loop.team,
    pollIntervalMs: doc.loop.poll_interval_seconds * 1000,
    timeoutMs: doc.loop.timeout_seconds * 1000,
    rota: toRota(doc, contacts),
  };

  const oncallSection = doc.oncall;
  const oncall: OnCallProviderConfig | undefined =
    oncallSection?.url && oncallSection.token && oncallSection.schedule
      ? {
          kind: 'oncall',
          id: 'oncall',
          baseUrl: oncallSection.url,
          token: oncallSection.token,
          schedule: oncallSection.schedule,
          pollIntervalMs: oncallSection.poll_interval_seconds * 1000,
          timeoutMs: oncallSection.timeout_seconds * 1000,
        }
      : undefined;

  const providers: ProviderConfig[] = oncall ? [loop, oncall] : [loop];
  const providerIds = new Set(providers.map((p) => p.id));

  const sinks = doc.notifications.sinks.map(toSinkConfig);
  for (const sink of sinks) {
    const unknown = (sink.providers ?? []).filter((id) => !providerIds.has(id));
    if (unknown.length > 0) {
      throw new ConfigError(
        `Invalid config:\n  - notifications.sinks: ${sink.name} lists unknown provider(s) ${unknown.join(', ')}`,
      );
    }
  }

  const config: RuntimeConfig = {
    loop,
    oncall,
    providers,
    server: { host: doc.server.host, port: doc.server.port },
    reconciler: {
      cycleMarginMs: doc.reconciler.cycle_margin_seconds * 1000,
      notifyInitial: doc.reconciler.notify_initial,
      shutdownGraceMs: doc.reconciler.shutdown_grace_seconds * 1000,
    },
    notifications: {
      drainTimeoutMs: doc.notifications.drain_timeout_seconds * 1000,
      concurrency: doc.notifications.concurrency,
      sinks,
    },
    contacts,
    logging: { level: doc.logging.level, dir: doc.logging.dir },
  };

  return Object.freeze(config);
}

/**
 * Load, parse, and validate a config.toml file.
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<RuntimeConfig> {
  const absPath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Config file not found or unreadable: ${absPath}`, err);
  }

  let document: Record<string, unknown>;
  try {
    document = parseToml(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse config file: ${absPath}\n${detail}`, err);
  }

  return buildRuntimeConfig(document, env);
}

/**
 * Apply CLI overrides to a loaded config.
 */
export function applyOverrides(
  config: RuntimeConfig,
  overrides: { host?: string; port?: number; logLevel?: LogLevel },
): RuntimeConfig {
  let server = config.server;
  let logging = config.logging;

  if (overrides.host != null) {
    server = { ...server, host: overrides.host };
  }

  if (overrides.port != null) {
    if (!Number.isInteger(overrides.port) || overrides.port < 0 || overrides.port > 65_535) {
      throw new ConfigError(`Invalid port override: ${overrides.port}`);
    }
    server = { ...server, port: overrides.port };
  }

  if (overrides.logLevel != null) {
    logging = { ...logging, level: overrides.logLevel };
  }

  return Object.freeze({ ...config, server, logging });
}

function maskUrl(url: string): string {
  return URL.canParse(url) ? `${new URL(url).origin}/***` : '***';
}

/**
 * Copy of the config safe to print: provider tokens and webhook URLs are
 * masked. A webhook URL keeps its origin.
 */
export function redactConfig(config: RuntimeConfig): RuntimeConfig {
  const mask = <T extends ProviderConfig>(provider: T): T => ({ ...provider, token: '***' });
  const loop = mask(config.loop);
  const oncall = config.oncall ? mask(config.oncall) : undefined;
  const sinks = config.notifications.sinks.map((sink): SinkConfig => {
    switch (sink.type) {
      case 'webhook':
      case 'slack':
        return { ...sink, url: maskUrl(sink.url) };
      default:
        return sink;
    }
  });
  return {
    ...config,
    loop,
    oncall,
    providers: oncall ? [loop, oncall] : [loop],
    notifications: { ...config.notifications, sinks },
  };
}
