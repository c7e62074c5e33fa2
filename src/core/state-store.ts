import { emptySnapshot } from './snapshot.js';
import type { AggregatedState } from './types.js';

/**
 * Holder of the current AggregatedState. The reconciler is the only writer;
 * readers take the reference returned by `current()` and never see a partial
 * update.
 */
export class DutyStateStore {
  private snapshot: AggregatedState = emptySnapshot();
  private ready = false;

  current(): AggregatedState {
    return this.snapshot;
  }

  /**
   * Replace the snapshot. Rejects a snapshot that is not newer than the
   * current one or whose observedAt goes backwards.
   */
  publish(next: AggregatedState): void {
    if (next.cycle <= this.snapshot.cycle) {
      throw new Error(`Snapshot cycle ${next.cycle} is not newer than ${this.snapshot.cycle}`);
    }
    if (Date.parse(next.observedAt) < Date.parse(this.snapshot.observedAt)) {
      throw new Error(`Snapshot observedAt ${next.observedAt} precedes ${this.snapshot.observedAt}`);
    }

    this.snapshot = next;
    if (!this.ready) {
      this.ready = Object.values(next.providers).some((entry) => !entry.stale);
    }
  }

  /** True once a published cycle carried at least one fresh provider state. */
  isReady(): boolean {
    return this.ready;
  }
}
