import type { LoopApi } from '../../loop/api.js';
import { formatTransition } from '../message.js';
import type { NotificationSink, SinkConfigOf, Transition } from '../types.js';

/**
 * Posts a message to a Loop channel with the `[loop]` bot credentials.
 */
export class LoopSink implements NotificationSink {
  readonly type = 'loop';

  constructor(
    private readonly config: SinkConfigOf<'loop'>,
    private readonly api: LoopApi,
  ) {}

  get name(): string {
    return this.config.name;
  }

  get providers(): readonly string[] | undefined {
    return this.config.providers;
  }

  get retry(): SinkConfigOf<'loop'>['retry'] {
    return this.config.retry;
  }

  async deliver(transition: Transition, signal: AbortSignal): Promise<void> {
    await this.api.sendMessage(this.config.channel, formatTransition(transition), { signal });
  }
}
