import { DispatchError } from '../../errors.js';
import { requestText, resolveEnvRefs } from '../../util/http.js';
import { formatTransition } from '../message.js';
import type { NotificationSink, SinkConfigOf, Transition } from '../types.js';

function buildBlocks(transition: Transition): object[] {
  const { current } = transition;
  const fields = [
    `*provider:* ${transition.providerId}`,
    `*person:* ${current.person ? `${current.person.displayName} (${current.person.id})` : 'nobody'}`,
  ];
  if (current.validUntil) {
    fields.push(`*until:* ${current.validUntil}`);
  }

  return [
    {
      type: 'header',
      text: {
        type: 'plain_text',
        text: 'Duty changed',
        emoji: true,
      },
    },
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: fields.join('\n'),
      },
    },
  ];
}

/**
 * Slack incoming webhook.
 */
export class SlackSink implements NotificationSink {
  readonly type = 'slack';

  constructor(
    private readonly config: SinkConfigOf<'slack'>,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  get name(): string {
    return this.config.name;
  }

  get providers(): readonly string[] | undefined {
    return this.config.providers;
  }

  get retry(): SinkConfigOf<'slack'>['retry'] {
    return this.config.retry;
  }

  async deliver(transition: Transition, signal: AbortSignal): Promise<void> {
    const webhookUrl = resolveEnvRefs(this.config.url, this.env);
    if (!URL.canParse(webhookUrl)) {
      throw new DispatchError(`${this.name}: webhook URL resolved to an invalid value`, this.name, false);
    }

    const payload: Record<string, unknown> = {
      text: formatTransition(transition),
      blocks: buildBlocks(transition),
    };
    if (this.config.channel) {
      payload['channel'] = this.config.channel;
    }

    await requestText(webhookUrl, {
      method: 'POST',
      body: payload,
      timeoutMs: this.config.timeoutMs,
      signal,
    });
  }
}
