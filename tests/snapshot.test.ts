import { describe, it, expect } from 'vitest';
import { diffSnapshots, emptySnapshot, mergeOutcomes, nextObservedAt } from '../src/core/snapshot.js';
import { ProviderTimeoutError } from '../src/errors.js';
import { makeState } from './fixtures/duty-fixtures.js';

const alice = { id: 'alice', displayName: 'Alice' };
const bob = { id: 'bob', displayName: 'Bob' };
const T1 = new Date('2024-05-01T10:00:00.000Z');
const T2 = new Date('2024-05-01T10:01:00.000Z');

describe('mergeOutcomes', () => {
  it('adds fresh entries and bumps the cycle', () => {
    const next = mergeOutcomes(emptySnapshot(), [{ providerId: 'loop', ok: true, state: makeState('loop', alice) }], T1);

    expect(next.cycle).toBe(1);
    expect(next.observedAt).toBe('2024-05-01T10:00:00.000Z');
    expect(next.providers['loop']).toEqual({
      state: makeState('loop', alice),
      stale: false,
      lastSuccessAt: '2024-05-01T10:00:00.000Z',
      consecutiveFailures: 0,
    });
    expect(Object.isFrozen(next)).toBe(true);
    expect(Object.isFrozen(next.providers)).toBe(true);
  });

  it('keeps the last good state of a failed provider and marks it stale', () => {
    const first = mergeOutcomes(emptySnapshot(), [{ providerId: 'loop', ok: true, state: makeState('loop', bob) }], T1);
    const error = new ProviderTimeoutError('loop did not answer within 30000ms', 'loop', 30_000);
    const second = mergeOutcomes(first, [{ providerId: 'loop', ok: false, error }], T2);
    const third = mergeOutcomes(second, [{ providerId: 'loop', ok: false, error }], T2);

    expect(third.providers['loop']).toEqual({
      state: makeState('loop', bob),
      stale: true,
      lastSuccessAt: '2024-05-01T10:00:00.000Z',
      consecutiveFailures: 2,
      lastError: { kind: 'timeout', message: 'loop did not answer within 30000ms' },
    });
  });

  it('leaves no entry for a provider that never succeeded', () => {
    const error = new ProviderTimeoutError('slow', 'oncall', 1000);
    const next = mergeOutcomes(emptySnapshot(), [{ providerId: 'oncall', ok: false, error }], T1);
    expect(next.providers).toEqual({});
  });

  it('carries over providers that were not polled', () => {
    const first = mergeOutcomes(
      emptySnapshot(),
      [
        { providerId: 'loop', ok: true, state: makeState('loop', alice) },
        { providerId: 'oncall', ok: true, state: makeState('oncall', bob) },
      ],
      T1,
    );
    const second = mergeOutcomes(first, [{ providerId: 'oncall', ok: true, state: makeState('oncall', alice) }], T2);
    expect(second.providers['loop']).toBe(first.providers['loop']);
    expect(second.providers['oncall']?.state.person).toEqual(alice);
  });

  it('never moves observedAt backwards', () => {
    const first = mergeOutcomes(emptySnapshot(), [], T2);
    const second = mergeOutcomes(first, [], T1);
    expect(second.observedAt).toBe('2024-05-01T10:01:00.000Z');
  });
});

describe('nextObservedAt', () => {
  it('takes the later instant', () => {
    expect(nextObservedAt('2024-05-01T10:00:00.000Z', T2)).toBe('2024-05-01T10:01:00.000Z');
    expect(nextObservedAt('2024-05-01T11:00:00.000Z', T2)).toBe('2024-05-01T11:00:00.000Z');
  });
});

describe('diffSnapshots', () => {
  const base = mergeOutcomes(emptySnapshot(), [{ providerId: 'loop', ok: true, state: makeState('loop', alice) }], T1);

  it('emits a transition when the person changes', () => {
    const next = mergeOutcomes(base, [{ providerId: 'loop', ok: true, state: makeState('loop', bob, 'rev-2') }], T2);
    expect(diffSnapshots(base, next, { notifyInitial: false })).toEqual([
      {
        providerId: 'loop',
        previous: makeState('loop', alice),
        current: makeState('loop', bob, 'rev-2'),
        observedAt: '2024-05-01T10:01:00.000Z',
      },
    ]);
  });

  it('emits a transition when only the revision changes', () => {
    const next = mergeOutcomes(base, [{ providerId: 'loop', ok: true, state: makeState('loop', alice, 'rev-9') }], T2);
    expect(diffSnapshots(base, next, { notifyInitial: false })).toHaveLength(1);
  });

  it('emits nothing for an unchanged roster', () => {
    const next = mergeOutcomes(base, [{ providerId: 'loop', ok: true, state: makeState('loop', alice) }], T2);
    expect(diffSnapshots(base, next, { notifyInitial: false })).toEqual([]);
  });

  it('emits nothing when a provider goes stale', () => {
    const error = new ProviderTimeoutError('slow', 'loop', 1000);
    const next = mergeOutcomes(base, [{ providerId: 'loop', ok: false, error }], T2);
    expect(diffSnapshots(base, next, { notifyInitial: false })).toEqual([]);
  });

  it('reports first observations only when asked to', () => {
    expect(diffSnapshots(emptySnapshot(), base, { notifyInitial: false })).toEqual([]);
    expect(diffSnapshots(emptySnapshot(), base, { notifyInitial: true })).toEqual([
      { providerId: 'loop', previous: null, current: makeState('loop', alice), observedAt: base.observedAt },
    ]);
  });
});
