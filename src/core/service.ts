import type { Hono } from 'hono';
import type { RuntimeConfig } from '../config/loader.js';
import { ContactDirectory } from '../contacts/directory.js';
import type { Logger } from '../logging/logger.js';
import { NotificationDispatcher, createSinks } from '../notifications/dispatcher.js';
import type { NotificationSink } from '../notifications/types.js';
import { createProviders } from '../providers/factory.js';
import type { ProviderClient } from '../providers/types.js';
import { createApp } from '../server/app.js';
import { startServer, type RunningServer } from '../server/serve.js';
import { ScheduleReconciler } from './reconciler.js';
import { DutyStateStore } from './state-store.js';

export interface DutyServiceOverrides {
  providers?: Map<string, ProviderClient>;
  sinks?: NotificationSink[];
}

/**
 * Wires providers, reconciler, dispatcher and HTTP server together and owns
 * their lifecycle.
 */
export class DutyService {
  readonly store = new DutyStateStore();
  readonly reconciler: ScheduleReconciler;
  readonly dispatcher: NotificationDispatcher;
  readonly app: Hono;

  private server: RunningServer | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(
    private readonly config: RuntimeConfig,
    private readonly logger: Logger,
    overrides: DutyServiceOverrides = {},
  ) {
    const directory = new ContactDirectory(config.contacts);
    const providers = overrides.providers ?? createProviders(config.providers, directory, logger.child('providers'));
    const sinks = overrides.sinks ?? createSinks(config, directory, logger.child('sinks'));

    this.dispatcher = new NotificationDispatcher(sinks, {
      concurrency: config.notifications.concurrency,
      logger: logger.child('dispatcher'),
    });
    this.reconciler = new ScheduleReconciler({
      providers,
      store: this.store,
      sink: this.dispatcher,
      logger: logger.child('reconciler'),
      cycleMarginMs: config.reconciler.cycleMarginMs,
      notifyInitial: config.reconciler.notifyInitial,
    });
    this.app = createApp({
      store: this.store,
      reconciler: this.reconciler,
      deliveries: () => this.dispatcher.deliveryStats(),
      logger: logger.child('server'),
    });

    this.logger.info(
      `Configured providers: ${[...providers.keys()].join(', ')}; sinks: ${sinks.map((s) => s.name).join(', ') || 'none'}`,
    );
  }

  /**
   * Bind the HTTP server, then start the reconciliation loop. A bind failure
   * rejects with TransportError before any provider is polled.
   */
  async start(): Promise<RunningServer> {
    this.server = await startServer(this.app, this.config.server, this.logger);
    this.reconciler.start();
    return this.server;
  }

  /**
   * Stop serving, stop the reconciler with its grace period, then drain
   * pending deliveries. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  /**
   * Run until SIGINT or SIGTERM, then shut down gracefully.
   */
  async run(): Promise<void> {
    await this.start();

    const signal = await new Promise<NodeJS.Signals>((resolve) => {
      process.once('SIGINT', () => resolve('SIGINT'));
      process.once('SIGTERM', () => resolve('SIGTERM'));
    });
    this.logger.warn(`Received ${signal}, shutting down gracefully`);
    await this.shutdown();
  }

  private async doShutdown(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
    await this.reconciler.stop(this.config.reconciler.shutdownGraceMs);

    const drained = await this.dispatcher.drain(this.config.notifications.drainTimeoutMs);
    if (!drained) {
      this.logger.warn('Some notifications were not delivered before shutdown');
    }
    this.logger.info('Shutdown complete');
  }
}
