import { DispatchError } from '../../errors.js';
import { requestText, resolveEnvRefs } from '../../util/http.js';
import { toPayload } from '../message.js';
import type { NotificationSink, SinkConfigOf, Transition } from '../types.js';

export class WebhookSink implements NotificationSink {
  readonly type = 'webhook';

  constructor(
    private readonly config: SinkConfigOf<'webhook'>,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  get name(): string {
    return this.config.name;
  }

  get providers(): readonly string[] | undefined {
    return this.config.providers;
  }

  get retry(): SinkConfigOf<'webhook'>['retry'] {
    return this.config.retry;
  }

  async deliver(transition: Transition, signal: AbortSignal): Promise<void> {
    const url = resolveEnvRefs(this.config.url, this.env);
    if (!URL.canParse(url)) {
      throw new DispatchError(`${this.name}: webhook URL resolved to an invalid value`, this.name, false);
    }

    await requestText(url, {
      method: 'POST',
      body: toPayload(transition),
      timeoutMs: this.config.timeoutMs,
      signal,
    });
  }
}
