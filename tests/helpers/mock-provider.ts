import { UnavailableError } from '../../src/errors.js';
import type { DutyState, Person, ProviderClient } from '../../src/providers/types.js';

type Step = { person: Person | null; revision?: string } | Error;

/**
 * Provider client that answers from a script, one step per poll. The last
 * step repeats once the script runs out.
 */
export class MockDutyProvider implements ProviderClient {
  readonly kind = 'loop';
  calls = 0;
  private readonly steps: Step[];

  constructor(
    readonly id: string,
    steps: Step[],
    readonly pollIntervalMs = 60_000,
    readonly timeoutMs = 1_000,
  ) {
    this.steps = [...steps];
  }

  async fetchDuty(): Promise<DutyState> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    if (!step) {
      throw new UnavailableError(`${this.id}: no scripted answer`, this.id);
    }
    if (step instanceof Error) {
      throw step;
    }
    return {
      providerId: this.id,
      person: step.person,
      sourceRevision: step.revision ?? `rev-${step.person?.id ?? 'none'}`,
      fetchedAt: new Date().toISOString(),
    };
  }
}

export function person(id: string, displayName = id): Person {
  return { id, displayName };
}
