import pLimit from 'p-limit';
import type { RuntimeConfig, SinkConfig } from '../config/loader.js';
import type { ContactDirectory } from '../contacts/directory.js';
import { RetryExecutor } from '../execution/retry.js';
import type { LoggerLike } from '../logging/logger.js';
import { LoopApi } from '../loop/api.js';
import type { DutyState } from '../providers/types.js';
import { toDispatchError } from './failures.js';
import { LogSink } from './sinks/log-sink.js';
import { LoopGroupSink } from './sinks/loop-group-sink.js';
import { LoopSink } from './sinks/loop-sink.js';
import { SlackSink } from './sinks/slack-sink.js';
import { WebhookSink } from './sinks/webhook-sink.js';
import type {
  DeliveryStats,
  DispatchResult,
  NotificationSink,
  SinkDelivery,
  Transition,
  TransitionSink,
} from './types.js';

/**
 * Per-provider delivery lane. At most one transition is in flight and at most
 * one waits behind it; a newer one replaces the waiting one. `active` drops to
 * false in the same step that finds `pending` empty.
 */
interface Lane {
  active: boolean;
  done: Promise<void>;
  pending: Transition | null;
  lastDelivered: DutyState | null;
}

function sameDuty(a: DutyState | null, b: DutyState | null): boolean {
  if (!a || !b) return false;
  return (a.person?.id ?? null) === (b.person?.id ?? null) && a.sourceRevision === b.sourceRevision;
}

export interface DispatcherOptions {
  /** Maximum concurrent sink deliveries across all lanes. */
  concurrency: number;
  logger: LoggerLike;
}

export class NotificationDispatcher implements TransitionSink {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly retry: RetryExecutor;
  private readonly logger: LoggerLike;
  private readonly lanes = new Map<string, Lane>();
  private readonly stats = new Map<string, DeliveryStats>();
  private readonly controller = new AbortController();
  private closed = false;

  constructor(
    private readonly sinks: readonly NotificationSink[],
    opts: DispatcherOptions,
  ) {
    this.logger = opts.logger;
    this.limit = pLimit(Math.max(1, opts.concurrency));
    this.retry = new RetryExecutor(opts.logger);
    for (const sink of sinks) {
      this.stats.set(sink.name, { delivered: 0, failed: 0, retries: 0 });
    }
  }

  get sinkCount(): number {
    return this.sinks.length;
  }

  /**
   * Deliver one transition to every sink that accepts its provider. Never
   * rejects; failures are reported per sink.
   */
  async notify(transition: Transition): Promise<DispatchResult> {
    const targets = this.sinks.filter(
      (sink) => !sink.providers || sink.providers.includes(transition.providerId),
    );

    const deliveries = await Promise.all(
      targets.map((sink) => this.limit(() => this.deliver(sink, transition))),
    );

    return {
      providerId: transition.providerId,
      sourceRevision: transition.current.sourceRevision,
      deliveries,
    };
  }

  /**
   * Queue transitions on their provider lanes. Returns immediately.
   */
  submit(transitions: readonly Transition[]): void {
    for (const transition of transitions) {
      if (this.closed) {
        this.logger.warn('Dispatcher is draining; transition dropped', { provider: transition.providerId });
        continue;
      }

      let lane = this.lanes.get(transition.providerId);
      if (!lane) {
        lane = { active: false, done: Promise.resolve(), pending: null, lastDelivered: transition.previous };
        this.lanes.set(transition.providerId, lane);
      }

      if (lane.active) {
        if (lane.pending) {
          this.logger.debug('Coalesced pending transition', { provider: transition.providerId });
        }
        lane.pending = transition;
        continue;
      }

      this.startLane(lane, transition);
    }
  }

  /**
   * Stop accepting transitions and wait for running lanes. After `timeoutMs`
   * outstanding retries are aborted. Resolves to true when every lane finished
   * in time.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    this.closed = true;
    const running = this.runningLanes();
    if (running.length === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const drained = await Promise.race([Promise.all(running).then(() => true as const), timedOut]);
    clearTimeout(timer);

    if (!drained) {
      this.logger.warn(`Drain timed out after ${timeoutMs}ms; aborting outstanding deliveries`);
      this.controller.abort();
      await Promise.all(this.runningLanes());
    }
    return drained;
  }

  deliveryStats(): Record<string, DeliveryStats> {
    const result: Record<string, DeliveryStats> = {};
    for (const [name, stats] of this.stats) {
      result[name] = { ...stats };
    }
    return result;
  }

  private runningLanes(): Promise<void>[] {
    const running: Promise<void>[] = [];
    for (const lane of this.lanes.values()) {
      if (lane.active) running.push(lane.done);
    }
    return running;
  }

  private startLane(lane: Lane, first: Transition): void {
    lane.active = true;
    lane.done = this.runLane(lane, first);
  }

  private async runLane(lane: Lane, first: Transition): Promise<void> {
    let next: Transition | null = first;
    try {
      while (next) {
        if (sameDuty(next.current, lane.lastDelivered)) {
          this.logger.debug('Transition settled back to the delivered state; dropped', {
            provider: next.providerId,
          });
        } else if (!this.controller.signal.aborted) {
          await this.notify(next);
          lane.lastDelivered = next.current;
        }
        next = lane.pending;
        lane.pending = null;
      }
    } finally {
      lane.active = false;
    }
  }

  private async deliver(sink: NotificationSink, transition: Transition): Promise<SinkDelivery> {
    const stats = this.statsFor(sink.name);
    const result = await this.retry.execute({
      fn: () => sink.deliver(transition, this.controller.signal),
      maxAttempts: sink.retry.maxAttempts,
      baseDelayMs: sink.retry.baseDelayMs,
      maxDelayMs: sink.retry.maxDelayMs,
      shouldRetry: (err) => toDispatchError(err, sink.name).transient,
      onRetry: () => {
        stats.retries++;
      },
      signal: this.controller.signal,
      description: `${sink.name} ${transition.providerId}@${transition.current.sourceRevision}`,
    });

    if (result.success) {
      stats.delivered++;
      this.logger.info(`Delivered duty change to ${sink.name}`, {
        provider: transition.providerId,
        sink: sink.name,
        data: { attempts: result.attempts },
      });
      return { sink: sink.name, ok: true, attempts: result.attempts };
    }

    stats.failed++;
    const error = toDispatchError(result.error, sink.name);
    this.logger.event(
      {
        type: 'delivery-failed',
        providerId: transition.providerId,
        sink: sink.name,
        attempts: result.attempts,
        error: error.message,
      },
      'error',
    );
    return { sink: sink.name, ok: false, attempts: result.attempts, error: error.message };
  }

  private statsFor(name: string): DeliveryStats {
    let stats = this.stats.get(name);
    if (!stats) {
      stats = { delivered: 0, failed: 0, retries: 0 };
      this.stats.set(name, stats);
    }
    return stats;
  }
}

/**
 * Build the configured sinks. The Loop sinks reuse the `[loop]` credentials.
 */
export function createSinks(
  config: RuntimeConfig,
  directory: ContactDirectory,
  logger: LoggerLike,
): NotificationSink[] {
  const loopApi = (sink: SinkConfig): LoopApi =>
    new LoopApi({
      baseUrl: config.loop.baseUrl,
      token: config.loop.token,
      team: config.loop.team,
      timeoutMs: sink.timeoutMs,
    });

  return config.notifications.sinks.map((sink): NotificationSink => {
    switch (sink.type) {
      case 'webhook':
        return new WebhookSink(sink);
      case 'slack':
        return new SlackSink(sink);
      case 'loop':
        return new LoopSink(sink, loopApi(sink));
      case 'loop-group':
        return new LoopGroupSink(sink, loopApi(sink), directory, logger);
      case 'log':
        return new LogSink(sink);
    }
  });
}
