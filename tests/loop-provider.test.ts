import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { LoopProviderConfig } from '../src/config/loader.js';
import { ContactDirectory } from '../src/contacts/directory.js';
import { AuthError, MalformedResponseError, ProviderTimeoutError, UnavailableError } from '../src/errors.js';
import { revisionOf } from '../src/providers/failures.js';
import { LoopDutyProvider } from '../src/providers/loop-provider.js';
import type { Contact } from '../src/config/loader.js';

const CONFIG: LoopProviderConfig = {
  kind: 'loop',
  id: 'loop',
  baseUrl: 'https://loop.example',
  token: 't1',
  schedule: 'primary',
  team: 'platform',
  pollIntervalMs: 60_000,
  timeoutMs: 1_000,
};

function okJson(data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('LoopDutyProvider.fetchDuty()', () => {
  let fetchStub: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchStub = vi.fn();
    vi.stubGlobal('fetch', fetchStub);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reports the first group member as the person on duty', async () => {
    fetchStub.mockResolvedValue(
      okJson([
        { user_id: 'u1', username: 'alice', first_name: 'Alice', last_name: 'Smith', email: 'alice@example.com' },
        { user_id: 'u2', username: 'bob' },
      ]),
    );
    const provider = new LoopDutyProvider(CONFIG, new ContactDirectory([]));

    const state = await provider.fetchDuty();

    expect(state.providerId).toBe('loop');
    expect(state.person).toEqual({ id: 'alice', displayName: 'Alice Smith' });
    expect(state.sourceRevision).toBe(revisionOf(['loop', 'primary', 'u1', 'u2']));
    expect(state.validFrom).toBeUndefined();

    const [url, init] = fetchStub.mock.calls[0];
    expect(url).toBe('https://loop.example/api/v4/groups/primary/members');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer t1', 'X-Loop-Team': 'platform' });
  });

  it('hashes member ids independently of their order', async () => {
    fetchStub
      .mockResolvedValueOnce(okJson([{ user_id: 'u1', username: 'alice' }, { user_id: 'u2', username: 'bob' }]))
      .mockResolvedValueOnce(okJson([{ user_id: 'u2', username: 'bob' }, { user_id: 'u1', username: 'alice' }]));
    const provider = new LoopDutyProvider(CONFIG, new ContactDirectory([]));

    const first = await provider.fetchDuty();
    const second = await provider.fetchDuty();

    expect(second.sourceRevision).toBe(first.sourceRevision);
    expect(second.person?.id).toBe('bob');
  });

  it('looks up the profile of a member listed without a username and maps it to a contact', async () => {
    fetchStub
      .mockResolvedValueOnce(okJson({ members: [{ user_id: 'u9' }] }))
      .mockResolvedValueOnce(
        okJson({ id: 'u9', username: 'bob', first_name: 'Bob', last_name: '', email: 'bob@example.com' }),
      );
    const directory = new ContactDirectory([
      { key: 'robert', ldap: 'rjones', fullName: 'Robert Jones', aliases: ['bob@example.com'] },
    ]);
    const provider = new LoopDutyProvider(CONFIG, directory);

    const state = await provider.fetchDuty();

    expect(state.person).toEqual({ id: 'rjones', displayName: 'Robert Jones' });
    expect(fetchStub.mock.calls[1][0]).toBe('https://loop.example/api/v4/users/u9');
  });

  it('reports nobody on duty for an empty group', async () => {
    fetchStub.mockResolvedValue(okJson([]));
    const provider = new LoopDutyProvider(CONFIG, new ContactDirectory([]));
    const state = await provider.fetchDuty();
    expect(state.person).toBeNull();
    expect(state.sourceRevision).toBe(revisionOf(['loop', 'primary']));
  });

  it('maps 401 to AuthError', async () => {
    fetchStub.mockResolvedValue(new Response('unauthorized', { status: 401 }));
    const provider = new LoopDutyProvider(CONFIG, new ContactDirectory([]));
    const err = await provider.fetchDuty().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ kind: 'auth', providerId: 'loop', status: 401 });
  });

  it('maps 5xx to UnavailableError', async () => {
    fetchStub.mockResolvedValue(new Response('oops', { status: 502 }));
    const provider = new LoopDutyProvider(CONFIG, new ContactDirectory([]));
    const err = await provider.fetchDuty().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UnavailableError);
    expect(err).toMatchObject({ status: 502 });
  });

  it('maps an unexpected payload to MalformedResponseError', async () => {
    fetchStub.mockResolvedValue(okJson({ unexpected: true }));
    const provider = new LoopDutyProvider(CONFIG, new ContactDirectory([]));
    await expect(provider.fetchDuty()).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('rejects a member without an id', async () => {
    fetchStub.mockResolvedValue(okJson([{ username: 'ghost' }]));
    const provider = new LoopDutyProvider(CONFIG, new ContactDirectory([]));
    await expect(provider.fetchDuty()).rejects.toThrow('loop: group primary lists a member without an id');
  });

  it('times out a hanging call', async () => {
    fetchStub.mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_, reject) => {
          init.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
        }),
    );
    const provider = new LoopDutyProvider({ ...CONFIG, timeoutMs: 20 }, new ContactDirectory([]));
    const err = await provider.fetchDuty().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderTimeoutError);
    expect(err).toMatchObject({ kind: 'timeout', timeoutMs: 20 });
  });
});

describe('LoopDutyProvider with a weekday rota', () => {
  const alice: Contact = { key: 'alice', ldap: 'asmith', fullName: 'Alice Smith', aliases: [] };
  const bob: Contact = { key: 'bob', ldap: 'bjones', fullName: 'Bob Jones', aliases: [] };
  const ROTA_CONFIG: LoopProviderConfig = {
    ...CONFIG,
    rota: { timeZone: 'Europe/Moscow', days: { monday: alice, sunday: bob } },
  };
  let fetchStub: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchStub = vi.fn();
    vi.stubGlobal('fetch', fetchStub);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reports today's rota contact without calling Loop", async () => {
    // 22:00 UTC on Sunday is already Monday in Moscow
    const now = new Date('2024-05-05T22:00:00Z');
    const provider = new LoopDutyProvider(ROTA_CONFIG, new ContactDirectory([]), undefined, () => now);

    const state = await provider.fetchDuty();

    expect(state).toEqual({
      providerId: 'loop',
      person: { id: 'asmith', displayName: 'Alice Smith' },
      sourceRevision: revisionOf(['loop', 'rota', 'alice']),
      fetchedAt: '2024-05-05T22:00:00.000Z',
    });
    expect(fetchStub).not.toHaveBeenCalled();
  });

  it('reads the weekday in the rota time zone', async () => {
    const now = new Date('2024-05-05T12:00:00Z');
    const provider = new LoopDutyProvider(ROTA_CONFIG, new ContactDirectory([]), undefined, () => now);

    const state = await provider.fetchDuty();

    expect(state.person).toEqual({ id: 'bjones', displayName: 'Bob Jones' });
  });

  it('reports nobody on duty for a weekday without an entry', async () => {
    const now = new Date('2024-05-08T12:00:00Z');
    const provider = new LoopDutyProvider(ROTA_CONFIG, new ContactDirectory([]), undefined, () => now);

    const state = await provider.fetchDuty();

    expect(state.person).toBeNull();
    expect(state.sourceRevision).toBe(revisionOf(['loop', 'rota', 'none']));
    expect(fetchStub).not.toHaveBeenCalled();
  });
});
