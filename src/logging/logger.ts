import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, LogContext, DutyEvent } from './events.js';

export interface LoggerOptions {
  /** Directory for JSONL log files. File logging is off when unset. */
  logDir?: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

/**
 * The subset of Logger that components depend on.
 */
export interface LoggerLike {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  event(event: DutyEvent, level?: LogLevel): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger implements LoggerLike {
  private readonly opts: LoggerOptions;
  private readonly logFile: string | null;
  private initPromise: Promise<unknown> | null = null;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir,
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
    };
    this.logFile = this.opts.logDir ? join(this.opts.logDir, `${this.opts.source}.log`) : null;
  }

  get level(): LogLevel {
    return this.opts.level;
  }

  private async ensureDir(dir: string): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dir, { recursive: true });
    }
    await this.initPromise;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = format(new Date(entry.timestamp), 'HH:mm:ss.SSS');
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [entry.provider ?? null, entry.sink ? `sink:${entry.sink}` : null]
      .filter(Boolean)
      .join(' ');
    const ctxStr = ctx ? ` [${ctx}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    if (this.opts.console) {
      const formatted = this.formatConsole(entry);
      if (entry.level === 'error') {
        console.error(formatted);
      } else if (entry.level === 'warn') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (!this.opts.logDir || !this.logFile) return;

    try {
      await this.ensureDir(this.opts.logDir);
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      process.stderr.write(`Logger: cannot write ${this.logFile}: ${String(err)}\n`);
    }
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('error', message, context));
  }

  /**
   * Log a structured event.
   */
  event(event: DutyEvent, level: LogLevel = 'info'): void {
    const { type, ...data } = event;
    const provider = 'providerId' in event ? event.providerId : undefined;
    void this.writeEntry(this.buildEntry(level, type, { provider, data }));
  }

  /**
   * Create a child logger for a component. It shares level, console and
   * directory settings and writes to its own file.
   */
  child(source: string): Logger {
    return new Logger({
      logDir: this.opts.logDir,
      level: this.opts.level,
      console: this.opts.console,
      source,
    });
  }
}
