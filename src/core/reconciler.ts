import { ProviderTimeoutError } from '../errors.js';
import type { LoggerLike } from '../logging/logger.js';
import { toProviderError } from '../providers/failures.js';
import type { ProviderClient, ProviderOutcome } from '../providers/types.js';
import type { TransitionSink } from '../notifications/types.js';
import { diffSnapshots, mergeOutcomes } from './snapshot.js';
import type { DutyStateStore } from './state-store.js';
import type { ReconcilerPhase, Transition } from './types.js';

export interface ReconcilerOptions {
  providers: ReadonlyMap<string, ProviderClient>;
  store: DutyStateStore;
  sink: TransitionSink;
  logger: LoggerLike;
  /** Added to the slowest polled provider's timeout to bound a cycle. */
  cycleMarginMs: number;
  notifyInitial: boolean;
  now?: () => Date;
}

export interface CycleResult {
  cycle: number;
  polled: string[];
  failed: string[];
  transitions: Transition[];
}

export interface ReconcilerHealth {
  phase: ReconcilerPhase;
  alive: boolean;
  cycle: number;
  lastCycleAt: string | null;
  error?: string;
}

/**
 * Polls the provider clients on their own cadence, folds the answers into the
 * store and forwards transitions. Cycles run one at a time.
 */
export class ScheduleReconciler {
  private readonly providers: ReadonlyMap<string, ProviderClient>;
  private readonly store: DutyStateStore;
  private readonly sink: TransitionSink;
  private readonly logger: LoggerLike;
  private readonly now: () => Date;
  private readonly controller = new AbortController();
  private readonly lastPolledAt = new Map<string, number>();
  private readonly requested = new Set<string>();

  private phaseValue: ReconcilerPhase = 'idle';
  private loop: Promise<void> | null = null;
  private cycleChain: Promise<unknown> = Promise.resolve();
  private wake: (() => void) | null = null;
  private stopping = false;
  private lastCycleAt: string | null = null;
  private crash: Error | null = null;

  constructor(private readonly opts: ReconcilerOptions) {
    this.providers = opts.providers;
    this.store = opts.store;
    this.sink = opts.sink;
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
  }

  get phase(): ReconcilerPhase {
    return this.phaseValue;
  }

  providerIds(): string[] {
    return [...this.providers.keys()];
  }

  has(providerId: string): boolean {
    return this.providers.has(providerId);
  }

  health(): ReconcilerHealth {
    return {
      phase: this.phaseValue,
      alive: this.loop !== null && this.crash === null && !this.stopping,
      cycle: this.store.current().cycle,
      lastCycleAt: this.lastCycleAt,
      ...(this.crash ? { error: this.crash.message } : {}),
    };
  }

  /**
   * Start the background loop.
   */
  start(): void {
    if (this.loop) return;
    this.loop = this.run().catch((err: unknown) => {
      this.crash = err instanceof Error ? err : new Error(String(err));
      this.phaseValue = 'failed';
      this.logger.error(`Reconciliation loop crashed: ${this.crash.message}`);
    });
  }

  /**
   * Mark a provider due and wake the loop. Requests made before the next
   * cycle collapse into one poll. Returns false for an unknown provider.
   */
  refresh(providerId: string): boolean {
    if (!this.providers.has(providerId)) {
      return false;
    }
    this.requested.add(providerId);
    this.logger.debug('Refresh requested', { provider: providerId });
    this.wake?.();
    return true;
  }

  /**
   * Stop scheduling cycles, give the in-flight cycle `graceMs` to finish,
   * then abort outstanding provider calls.
   */
  async stop(graceMs: number): Promise<void> {
    this.stopping = true;
    this.wake?.();

    const loop = this.loop;
    if (loop) {
      let timer: NodeJS.Timeout | undefined;
      const finished = await Promise.race([
        loop.then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), graceMs);
        }),
      ]);
      clearTimeout(timer);

      if (!finished) {
        this.logger.warn(`In-flight cycle did not finish within ${graceMs}ms; aborting provider calls`);
        this.controller.abort();
        await loop;
      }
    }

    if (this.phaseValue !== 'failed') {
      this.phaseValue = 'stopped';
    }
  }

  /**
   * Run one reconciliation cycle over `providerIds` (every due provider when
   * omitted). Waits for a cycle already in progress.
   */
  runCycle(providerIds?: readonly string[]): Promise<CycleResult> {
    const next = this.cycleChain.then(() => this.cycle(providerIds ?? this.dueProviders(this.now().getTime())));
    this.cycleChain = next.catch(() => undefined);
    return next;
  }

  private async run(): Promise<void> {
    while (!this.stopping) {
      const now = this.now().getTime();
      const due = this.dueProviders(now);
      if (due.length > 0) {
        await this.runCycle(due);
        continue;
      }
      await this.sleep(this.nextDueAt() - now);
    }
  }

  private dueProviders(now: number): string[] {
    const due: string[] = [];
    for (const [id, provider] of this.providers) {
      const last = this.lastPolledAt.get(id);
      if (this.requested.has(id) || last === undefined || last + provider.pollIntervalMs <= now) {
        due.push(id);
      }
    }
    return due;
  }

  private nextDueAt(): number {
    let earliest = Number.POSITIVE_INFINITY;
    for (const [id, provider] of this.providers) {
      const last = this.lastPolledAt.get(id) ?? 0;
      earliest = Math.min(earliest, last + provider.pollIntervalMs);
    }
    return earliest;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, Math.max(0, Math.min(ms, 2_147_483_647)));
      function done(): void {
        clearTimeout(timer);
        resolve();
      }
      this.wake = () => {
        this.wake = null;
        done();
      };
    });
  }

  private async cycle(ids: readonly string[]): Promise<CycleResult> {
    const started = this.now();
    const polled = ids.filter((id) => this.providers.has(id));
    const previous = this.store.current();

    this.phaseValue = 'polling';
    for (const id of polled) {
      this.requested.delete(id);
      this.lastPolledAt.set(id, started.getTime());
    }
    const outcomes = await this.poll(polled);

    this.phaseValue = 'merging';
    const next = mergeOutcomes(previous, outcomes, this.now());
    const transitions = diffSnapshots(previous, next, { notifyInitial: this.opts.notifyInitial });

    this.store.publish(next);
    this.phaseValue = 'published';
    this.lastCycleAt = next.observedAt;

    this.logOutcomes(previous.providers, next.providers, outcomes);
    for (const transition of transitions) {
      this.logger.event({
        type: 'duty-changed',
        providerId: transition.providerId,
        person: transition.current.person?.id ?? null,
        previousPerson: transition.previous?.person?.id ?? null,
        sourceRevision: transition.current.sourceRevision,
      });
    }
    if (transitions.length > 0) {
      this.sink.submit(transitions);
    }

    const failed = outcomes.filter((o) => !o.ok).map((o) => o.providerId);
    this.logger.event(
      {
        type: 'cycle-completed',
        cycle: next.cycle,
        polled,
        failed,
        transitions: transitions.length,
        durationMs: this.now().getTime() - started.getTime(),
      },
      'debug',
    );

    this.phaseValue = 'idle';
    return { cycle: next.cycle, polled, failed, transitions };
  }

  private async poll(ids: readonly string[]): Promise<ProviderOutcome[]> {
    if (ids.length === 0) return [];

    const clients = ids.flatMap((id) => {
      const client = this.providers.get(id);
      return client ? [client] : [];
    });
    const budget = Math.max(...clients.map((c) => c.timeoutMs)) + this.opts.cycleMarginMs;
    const deadline = AbortSignal.timeout(budget);
    const signal = AbortSignal.any([deadline, this.controller.signal]);

    return Promise.all(clients.map((client) => this.pollOne(client, signal, budget)));
  }

  private async pollOne(client: ProviderClient, signal: AbortSignal, budget: number): Promise<ProviderOutcome> {
    try {
      const state = await Promise.race([client.fetchDuty(signal), rejectOnAbort(signal, client.id, budget)]);
      return { providerId: client.id, ok: true, state };
    } catch (err) {
      return { providerId: client.id, ok: false, error: toProviderError(err, client.id, client.timeoutMs) };
    }
  }

  private logOutcomes(
    before: Readonly<Record<string, { consecutiveFailures: number }>>,
    after: Readonly<Record<string, { consecutiveFailures: number }>>,
    outcomes: readonly ProviderOutcome[],
  ): void {
    for (const outcome of outcomes) {
      if (outcome.ok) {
        const failedPolls = before[outcome.providerId]?.consecutiveFailures ?? 0;
        if (failedPolls > 0) {
          this.logger.event({ type: 'provider-recovered', providerId: outcome.providerId, failedPolls });
        }
        continue;
      }
      this.logger.event(
        {
          type: 'provider-degraded',
          providerId: outcome.providerId,
          errorKind: outcome.error.kind,
          error: outcome.error.message,
          consecutiveFailures: after[outcome.providerId]?.consecutiveFailures ?? 1,
        },
        'warn',
      );
    }
  }
}

/**
 * Rejects with a ProviderTimeoutError once `signal` aborts, so a client that
 * ignores its signal cannot hold a cycle open.
 */
function rejectOnAbort(signal: AbortSignal, providerId: string, budget: number): Promise<never> {
  return new Promise<never>((_, reject) => {
    const fail = (): void =>
      reject(new ProviderTimeoutError(`${providerId} did not answer within the ${budget}ms cycle budget`, providerId, budget));
    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener('abort', fail, { once: true });
  });
}
