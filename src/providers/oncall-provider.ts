import { addDays, subDays } from 'date-fns';
import { z } from 'zod';
import type { OnCallProviderConfig } from '../config/loader.js';
import type { ContactDirectory } from '../contacts/directory.js';
import { collectIdentifiers } from '../contacts/directory.js';
import { UnavailableError } from '../errors.js';
import { HttpStatusError, joinUrl, requestJson } from '../util/http.js';
import { parsePayload } from '../util/payload.js';
import type { DutyState, ProviderClient } from './types.js';
import { revisionOf, runProviderCall } from './failures.js';

/** Upper bound on `next` links followed for one listing. */
const MAX_PAGES = 20;

const PageSchema = z
  .object({
    next: z.string().nullish(),
    results: z.array(z.unknown()),
  })
  .passthrough();

const ScheduleSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().nullish(),
  })
  .passthrough();

const ShiftSchema = z
  .object({
    user_pk: z.string().nullish(),
    user_email: z.string().nullish(),
    user_username: z.string().nullish(),
    shift_start: z.string().datetime({ offset: true }),
    shift_end: z.string().datetime({ offset: true }),
  })
  .passthrough();

type Shift = z.infer<typeof ShiftSchema>;

const LOGIN = /^[\w.-]+$/;

/**
 * Login-like id for a shift user with no configured contact: the e-mail local
 * part, a username without spaces, else the OnCall user pk. `user_username`
 * often holds a display name such as "Jane Doe (60116703)".
 */
function loginOf(shift: Shift): string | undefined {
  const email = shift.user_email?.trim();
  const at = email ? email.indexOf('@') : -1;
  if (email && at > 0) return email.slice(0, at);

  const username = shift.user_username?.trim();
  if (username && LOGIN.test(username)) return username;
  return shift.user_pk ?? undefined;
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Grafana OnCall provider: the person on duty comes from the final shifts of
 * a schedule, looked up by name or id.
 */
export class OnCallDutyProvider implements ProviderClient {
  readonly kind = 'oncall';
  private scheduleId?: string;

  constructor(
    private readonly config: OnCallProviderConfig,
    private readonly directory: ContactDirectory,
    private readonly now: () => Date = () => new Date(),
  ) {}

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
    return runProviderCall(this.id, this.timeoutMs, signal, async (sig) => {
      const instant = this.now();
      const fetchedAt = instant.toISOString();
      const scheduleId = await this.resolveSchedule(sig);

      let shifts: Shift[];
      try {
        shifts = await this.listPages(
          `/api/v1/schedules/${encodeURIComponent(scheduleId)}/final_shifts?start_date=${isoDay(subDays(instant, 1))}&end_date=${isoDay(addDays(instant, 1))}`,
          ShiftSchema,
          sig,
        );
      } catch (err) {
        if (err instanceof HttpStatusError && err.status === 404) {
          this.scheduleId = undefined;
        }
        throw err;
      }

      const at = instant.getTime();
      const active = shifts
        .filter((s) => Date.parse(s.shift_start) <= at && at < Date.parse(s.shift_end))
        .sort((a, b) => Date.parse(a.shift_start) - Date.parse(b.shift_start));

      const primary = active[0];
      const person = primary
        ? this.directory.toPerson(
            collectIdentifiers([primary.user_username, primary.user_email, primary.user_pk]),
            primary.user_username ?? undefined,
            loginOf(primary),
          )
        : null;

      return {
        providerId: this.id,
        person,
        validFrom: primary?.shift_start,
        validUntil: primary?.shift_end,
        sourceRevision: revisionOf([
          'oncall',
          scheduleId,
          ...active.map((s) => `${s.user_pk ?? s.user_username ?? ''}@${s.shift_start}/${s.shift_end}`),
        ]),
        fetchedAt,
      };
    });
  }

  private async resolveSchedule(signal: AbortSignal): Promise<string> {
    if (this.scheduleId) return this.scheduleId;

    const wanted = this.config.schedule.trim().toLowerCase();
    const schedules = await this.listPages('/api/v1/schedules/', ScheduleSchema, signal);
    const match =
      schedules.find((s) => s.id.toLowerCase() === wanted) ??
      schedules.find((s) => (s.name ?? '').trim().toLowerCase() === wanted);

    if (!match) {
      throw new UnavailableError(`${this.id}: schedule "${this.config.schedule}" not found`, this.id);
    }
    this.scheduleId = match.id;
    return match.id;
  }

  private async listPages<T extends z.ZodTypeAny>(
    path: string,
    item: T,
    signal: AbortSignal,
  ): Promise<z.output<T>[]> {
    const items: z.output<T>[] = [];
    let url: string | null | undefined = joinUrl(this.config.baseUrl, path);

    for (let page = 0; url && page < MAX_PAGES; page++) {
      const payload = await requestJson(url, {
        headers: { Authorization: this.config.token },
        timeoutMs: this.timeoutMs,
        signal,
      });
      const parsed: z.output<typeof PageSchema> = parsePayload(PageSchema, payload, url);
      for (const result of parsed.results) {
        items.push(parsePayload(item, result, url));
      }
      url = parsed.next;
    }
    return items;
  }
}
