import type { LoopProviderConfig } from '../config/loader.js';
import type { ContactDirectory } from '../contacts/directory.js';
import { collectIdentifiers } from '../contacts/directory.js';
import { rotaContactFor, type DutyRota } from '../contacts/rota.js';
import { MalformedResponseError } from '../errors.js';
import { LoopApi, fullNameOf, memberId, type LoopGroupMember } from '../loop/api.js';
import type { DutyState, Person, ProviderClient } from './types.js';
import { revisionOf, runProviderCall } from './failures.js';

/**
 * Loop provider: the duty roster is the membership of a Loop user group.
 * The first member the API lists is the person on duty. With a weekday rota
 * configured, today's rota contact is on duty instead and Loop is not asked.
 */
export class LoopDutyProvider implements ProviderClient {
  readonly kind = 'loop';
  private readonly api: LoopApi;

  constructor(
    private readonly config: LoopProviderConfig,
    private readonly directory: ContactDirectory,
    api?: LoopApi,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.api =
      api ??
      new LoopApi({
        baseUrl: config.baseUrl,
        token: config.token,
        team: config.team,
        timeoutMs: config.timeoutMs,
      });
  }

  get id(): string {
    return this.config.id;
  }

  get pollIntervalMs(): number {
    return this.config.pollIntervalMs;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  fetchDuty(signal?: AbortSignal): Promise<DutyState> {
    const rota = this.config.rota;
    if (rota) {
      return runProviderCall(this.id, this.timeoutMs, signal, async () => this.fromRota(rota));
    }
    return runProviderCall(this.id, this.timeoutMs, signal, async (sig) => {
      const fetchedAt = this.now().toISOString();
      const members = await this.api.getGroupMembers(this.config.schedule, sig);

      const ids = members.map(memberId);
      if (ids.some((id) => id === undefined)) {
        throw new MalformedResponseError(
          `${this.id}: group ${this.config.schedule} lists a member without an id`,
          this.id,
        );
      }

      const person = members.length > 0 ? await this.resolvePerson(members[0], sig) : null;

      return {
        providerId: this.id,
        person,
        sourceRevision: revisionOf(['loop', this.config.schedule, ...ids.map(String).sort()]),
        fetchedAt,
      };
    });
  }

  private fromRota(rota: DutyRota): DutyState {
    const now = this.now();
    const contact = rotaContactFor(rota, now);
    return {
      providerId: this.id,
      person: contact ? { id: contact.ldap, displayName: contact.fullName } : null,
      sourceRevision: revisionOf(['loop', 'rota', contact?.key ?? 'none']),
      fetchedAt: now.toISOString(),
    };
  }

  private async resolvePerson(member: LoopGroupMember, signal: AbortSignal): Promise<Person | null> {
    const id = memberId(member);
    const user = member.username || !id ? member : await this.api.getUser(id, signal);
    const identifiers = collectIdentifiers([user.username, user.auth_data, user.email, id]);
    return this.directory.toPerson(identifiers, fullNameOf(user));
  }
}
