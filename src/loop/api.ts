import { z } from 'zod';
import { joinUrl, requestJson } from '../util/http.js';
import { parsePayload } from '../util/payload.js';

/**
 * Configuration for talking to a Loop (Mattermost-compatible) server.
 */
export interface LoopApiConfig {
  baseUrl: string;
  /** Bot access token. */
  token: string;
  /** Sent as X-Loop-Team when set. */
  team?: string;
  /** Per-request timeout. */
  timeoutMs: number;
}

const LoopUserSchema = z
  .object({
    id: z.string().min(1),
    username: z.string().min(1),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
    email: z.string().nullish(),
    auth_data: z.string().nullish(),
  })
  .passthrough();

export type LoopUser = z.infer<typeof LoopUserSchema>;

const GroupMemberSchema = z
  .object({
    id: z.string().nullish(),
    user_id: z.string().nullish(),
    username: z.string().nullish(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
    email: z.string().nullish(),
    auth_data: z.string().nullish(),
  })
  .passthrough();

export type LoopGroupMember = z.infer<typeof GroupMemberSchema>;

/** The members endpoint answers either a plain list or `{ members: [...] }`. */
const GroupMembersSchema = z.union([
  z.array(GroupMemberSchema),
  z.object({ members: z.array(GroupMemberSchema) }).passthrough(),
]);

const PostSchema = z
  .object({
    id: z.string().min(1),
    root_id: z.string().nullish(),
    channel_id: z.string().nullish(),
  })
  .passthrough();

export type LoopPost = z.infer<typeof PostSchema>;

/**
 * User id of a group member: `user_id` on membership records, `id` on user records.
 */
export function memberId(member: LoopGroupMember): string | undefined {
  const id = (member.user_id ?? member.id ?? '').trim();
  return id || undefined;
}

/**
 * "First Last", falling back to the username.
 */
export function fullNameOf(user: Pick<LoopGroupMember, 'first_name' | 'last_name' | 'username'>): string | undefined {
  const name = [user.first_name, user.last_name].filter(Boolean).join(' ').trim();
  return name || user.username || undefined;
}

/**
 * Thin client for the parts of the Loop REST API the service uses.
 */
export class LoopApi {
  private readonly userCache = new Map<string, LoopUser>();

  constructor(private readonly config: LoopApiConfig) {}

  async getGroupMembers(groupId: string, signal?: AbortSignal): Promise<LoopGroupMember[]> {
    const path = `/api/v4/groups/${encodeURIComponent(groupId)}/members`;
    const payload = parsePayload(GroupMembersSchema, await this.request(path, { signal }), this.url(path));
    return Array.isArray(payload) ? payload : payload.members;
  }

  async getUser(userId: string, signal?: AbortSignal): Promise<LoopUser> {
    const cached = this.userCache.get(userId);
    if (cached) return cached;

    const path = `/api/v4/users/${encodeURIComponent(userId)}`;
    const user = parsePayload(LoopUserSchema, await this.request(path, { signal }), this.url(path));
    this.userCache.set(userId, user);
    return user;
  }

  async getUserByUsername(username: string, signal?: AbortSignal): Promise<LoopUser> {
    const path = `/api/v4/users/username/${encodeURIComponent(username)}`;
    const user = parsePayload(LoopUserSchema, await this.request(path, { signal }), this.url(path));
    this.userCache.set(user.id, user);
    return user;
  }

  async sendMessage(
    channelId: string,
    message: string,
    opts: { rootId?: string; signal?: AbortSignal } = {},
  ): Promise<LoopPost> {
    const body: Record<string, string> = { channel_id: channelId, message };
    if (opts.rootId) {
      body['root_id'] = opts.rootId;
    }
    const path = '/api/v4/posts';
    return parsePayload(
      PostSchema,
      await this.request(path, { method: 'POST', body, signal: opts.signal }),
      this.url(path),
    );
  }

  async addGroupMembers(groupId: string, userIds: readonly string[], signal?: AbortSignal): Promise<void> {
    if (userIds.length === 0) return;
    await this.request(`/api/v4/groups/${encodeURIComponent(groupId)}/members`, {
      method: 'POST',
      body: { user_ids: userIds },
      signal,
    });
  }

  async removeGroupMembers(groupId: string, userIds: readonly string[], signal?: AbortSignal): Promise<void> {
    if (userIds.length === 0) return;
    await this.request(`/api/v4/groups/${encodeURIComponent(groupId)}/members`, {
      method: 'DELETE',
      body: { user_ids: userIds },
      signal,
    });
  }

  private url(path: string): string {
    return joinUrl(this.config.baseUrl, path);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.config.token}` };
    if (this.config.team) {
      headers['X-Loop-Team'] = this.config.team;
    }
    return headers;
  }

  private request(
    path: string,
    init: { method?: string; body?: unknown; signal?: AbortSignal },
  ): Promise<unknown> {
    return requestJson(this.url(path), {
      method: init.method,
      headers: this.headers(),
      body: init.body,
      timeoutMs: this.config.timeoutMs,
      signal: init.signal,
    });
  }
}
