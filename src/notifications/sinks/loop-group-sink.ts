import type { ContactDirectory } from '../../contacts/directory.js';
import type { LoggerLike } from '../../logging/logger.js';
import type { LoopApi } from '../../loop/api.js';
import { memberId } from '../../loop/api.js';
import type { NotificationSink, SinkConfigOf, Transition } from '../types.js';

/**
 * Keeps a Loop user group's membership equal to the person on duty. Members
 * listed in `keepUsernames` are never removed. When nobody is on duty, or the
 * person on duty is not a configured contact, the group is left as it is.
 */
export class LoopGroupSink implements NotificationSink {
  readonly type = 'loop-group';

  constructor(
    private readonly config: SinkConfigOf<'loop-group'>,
    private readonly api: LoopApi,
    private readonly directory: ContactDirectory,
    private readonly logger: LoggerLike,
  ) {}

  get name(): string {
    return this.config.name;
  }

  get providers(): readonly string[] | undefined {
    return this.config.providers;
  }

  get retry(): SinkConfigOf<'loop-group'>['retry'] {
    return this.config.retry;
  }

  async deliver(transition: Transition, signal: AbortSignal): Promise<void> {
    const person = transition.current.person;
    if (!person) return;
    if (!this.directory.has(person.id)) {
      this.logger.warn(`${person.id} is not a configured contact; group ${this.config.group} left unchanged`, {
        provider: transition.providerId,
        sink: this.name,
      });
      return;
    }

    const onDuty = await this.api.getUserByUsername(person.id, signal);
    const keep = new Set<string>([onDuty.id]);
    for (const username of this.config.keepUsernames) {
      const user = await this.api.getUserByUsername(username, signal);
      keep.add(user.id);
    }

    const members = await this.api.getGroupMembers(this.config.group, signal);
    const current = new Set<string>();
    for (const member of members) {
      const id = memberId(member);
      if (id) current.add(id);
    }

    const stale = [...current].filter((id) => !keep.has(id));
    await this.api.removeGroupMembers(this.config.group, stale, signal);
    if (!current.has(onDuty.id)) {
      await this.api.addGroupMembers(this.config.group, [onDuty.id], signal);
    }
  }
}
