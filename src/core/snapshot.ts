import type { ProviderOutcome } from '../providers/types.js';
import type { AggregatedState, ProviderEntry, Transition } from './types.js';

export function emptySnapshot(): AggregatedState {
  return Object.freeze({
    observedAt: new Date(0).toISOString(),
    cycle: 0,
    providers: Object.freeze({}),
  });
}

/**
 * The later of the previous observation time and `now`, so observedAt never
 * moves backwards when the wall clock does.
 */
export function nextObservedAt(previous: string, now: Date): string {
  return Date.parse(previous) > now.getTime() ? previous : now.toISOString();
}

/**
 * Fold one cycle's outcomes into a new snapshot. Providers not polled carry
 * over; failed providers keep their last good state marked stale; a provider
 * that never succeeded stays absent.
 */
export function mergeOutcomes(
  previous: AggregatedState,
  outcomes: readonly ProviderOutcome[],
  now: Date,
): AggregatedState {
  const providers: Record<string, Readonly<ProviderEntry>> = { ...previous.providers };

  for (const outcome of outcomes) {
    if (outcome.ok) {
      providers[outcome.providerId] = Object.freeze({
        state: Object.freeze({ ...outcome.state }),
        stale: false,
        lastSuccessAt: outcome.state.fetchedAt,
        consecutiveFailures: 0,
      });
      continue;
    }

    const entry = previous.providers[outcome.providerId];
    if (!entry) continue;
    providers[outcome.providerId] = Object.freeze({
      ...entry,
      stale: true,
      consecutiveFailures: entry.consecutiveFailures + 1,
      lastError: { kind: outcome.error.kind, message: outcome.error.message },
    });
  }

  return Object.freeze({
    observedAt: nextObservedAt(previous.observedAt, now),
    cycle: previous.cycle + 1,
    providers: Object.freeze(providers),
  });
}

/**
 * Transitions between two consecutive snapshots: one per provider whose
 * person or roster revision changed. A provider's first observation yields a
 * transition only when `notifyInitial` is set.
 */
export function diffSnapshots(
  previous: AggregatedState,
  next: AggregatedState,
  opts: { notifyInitial: boolean },
): Transition[] {
  const transitions: Transition[] = [];

  for (const [providerId, entry] of Object.entries(next.providers)) {
    const before = previous.providers[providerId]?.state ?? null;
    const current = entry.state;

    if (!before) {
      if (opts.notifyInitial) {
        transitions.push({ providerId, previous: null, current, observedAt: next.observedAt });
      }
      continue;
    }

    const personChanged = (before.person?.id ?? null) !== (current.person?.id ?? null);
    if (personChanged || before.sourceRevision !== current.sourceRevision) {
      transitions.push({ providerId, previous: before, current, observedAt: next.observedAt });
    }
  }

  return transitions;
}
