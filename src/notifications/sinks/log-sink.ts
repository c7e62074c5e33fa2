import { appendFile } from 'node:fs/promises';
import { toPayload } from '../message.js';
import type { NotificationSink, SinkConfigOf, Transition } from '../types.js';

/**
 * Appends one JSON line per transition.
 */
export class LogSink implements NotificationSink {
  readonly type = 'log';

  constructor(private readonly config: SinkConfigOf<'log'>) {}

  get name(): string {
    return this.config.name;
  }

  get providers(): readonly string[] | undefined {
    return this.config.providers;
  }

  get retry(): SinkConfigOf<'log'>['retry'] {
    return this.config.retry;
  }

  async deliver(transition: Transition): Promise<void> {
    const line = JSON.stringify({ ...toPayload(transition), timestamp: new Date().toISOString() }) + '\n';
    await appendFile(this.config.file, line, 'utf-8');
  }
}
