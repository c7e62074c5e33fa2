import type { Person } from '../providers/types.js';
import type { Transition } from './types.js';

/**
 * Wire payload of a `duty.changed` notification.
 */
export interface DutyChangedPayload {
  event: 'duty.changed';
  provider_id: string;
  person: string | null;
  display_name: string | null;
  previous_person: string | null;
  source_revision: string;
  valid_from: string | null;
  valid_until: string | null;
  observed_at: string;
}

export function toPayload(transition: Transition): DutyChangedPayload {
  const { current, previous } = transition;
  return {
    event: 'duty.changed',
    provider_id: transition.providerId,
    person: current.person?.id ?? null,
    display_name: current.person?.displayName ?? null,
    previous_person: previous?.person?.id ?? null,
    source_revision: current.sourceRevision,
    valid_from: current.validFrom ?? null,
    valid_until: current.validUntil ?? null,
    observed_at: transition.observedAt,
  };
}

function describe(person: Person | null | undefined): string {
  return person ? `${person.displayName} (@${person.id})` : 'nobody';
}

/**
 * One-line human summary, used by the chat sinks.
 */
export function formatTransition(transition: Transition): string {
  const { current, previous } = transition;
  const head = `On duty for ${transition.providerId}: ${describe(current.person)}`;
  if (!previous) return head;
  if (previous.person?.id === current.person?.id) {
    return `${head} (roster updated)`;
  }
  return `${head}, previously ${describe(previous.person)}`;
}
