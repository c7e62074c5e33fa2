import { describe, it, expect } from 'vitest';
import { formatTransition, toPayload } from '../src/notifications/message.js';
import { makeState, makeTransition } from './fixtures/duty-fixtures.js';

const alice = { id: 'alice', displayName: 'Alice Smith' };
const bob = { id: 'bob', displayName: 'Bob Jones' };

describe('toPayload', () => {
  it('builds the duty.changed payload', () => {
    const current = { ...makeState('oncall', bob, 'rev-b'), validFrom: '2024-05-01T08:00:00Z', validUntil: '2024-05-01T20:00:00Z' };
    expect(toPayload(makeTransition('oncall', current, makeState('oncall', alice, 'rev-a')))).toEqual({
      event: 'duty.changed',
      provider_id: 'oncall',
      person: 'bob',
      display_name: 'Bob Jones',
      previous_person: 'alice',
      source_revision: 'rev-b',
      valid_from: '2024-05-01T08:00:00Z',
      valid_until: '2024-05-01T20:00:00Z',
      observed_at: '2024-05-01T10:00:01.000Z',
    });
  });

  it('uses null for absent people and bounds', () => {
    const payload = toPayload(makeTransition('loop', makeState('loop', null, 'rev-0')));
    expect(payload).toMatchObject({
      person: null,
      display_name: null,
      previous_person: null,
      valid_from: null,
      valid_until: null,
    });
  });
});

describe('formatTransition', () => {
  it('names the new and previous person', () => {
    expect(formatTransition(makeTransition('loop', makeState('loop', bob), makeState('loop', alice)))).toBe(
      'On duty for loop: Bob Jones (@bob), previously Alice Smith (@alice)',
    );
  });

  it('omits the previous person on first observation', () => {
    expect(formatTransition(makeTransition('loop', makeState('loop', bob)))).toBe('On duty for loop: Bob Jones (@bob)');
  });

  it('marks a roster change with the same person', () => {
    expect(
      formatTransition(makeTransition('loop', makeState('loop', bob, 'rev-2'), makeState('loop', bob, 'rev-1'))),
    ).toBe('On duty for loop: Bob Jones (@bob) (roster updated)');
  });

  it('reports nobody on duty', () => {
    expect(formatTransition(makeTransition('loop', makeState('loop', null), makeState('loop', bob)))).toBe(
      'On duty for loop: nobody, previously Bob Jones (@bob)',
    );
  });
});
