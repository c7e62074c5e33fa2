import { Hono } from 'hono';
import type { DutyStateStore } from '../core/state-store.js';
import type { ReconcilerHealth } from '../core/reconciler.js';
import type { LoggerLike } from '../logging/logger.js';
import type { DeliveryStats } from '../notifications/types.js';

/**
 * What the HTTP surface needs from the reconciler.
 */
export interface RefreshTarget {
  has(providerId: string): boolean;
  refresh(providerId: string): boolean;
  health(): ReconcilerHealth;
}

export interface AppDeps {
  store: DutyStateStore;
  reconciler: RefreshTarget;
  deliveries: () => Record<string, DeliveryStats>;
  logger: LoggerLike;
  now?: () => number;
}

interface DutyView {
  person: string | null;
  display_name: string | null;
  valid_from?: string;
  valid_until?: string;
  stale: boolean;
}

export function createApp(deps: AppDeps): Hono {
  const { store, reconciler, logger } = deps;
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const app = new Hono();

  app.get('/healthz', (c) => {
    const health = reconciler.health();
    const failing = health.phase === 'failed';
    return c.json(
      {
        status: failing ? 'failing' : 'ok',
        uptime_seconds: Math.floor((now() - startedAt) / 1000),
        reconciler: health,
        deliveries: deps.deliveries(),
      },
      failing ? 503 : 200,
    );
  });

  app.get('/ready', (c) => {
    if (!store.isReady()) {
      return c.json({ status: 'warming' }, 503);
    }
    const providers: Record<string, { stale: boolean }> = {};
    for (const [id, entry] of Object.entries(store.current().providers)) {
      providers[id] = { stale: entry.stale };
    }
    return c.json({ status: 'ready', providers });
  });

  app.get('/duty', (c) => {
    const duty: Record<string, DutyView> = {};
    for (const [id, entry] of Object.entries(store.current().providers)) {
      const { person, validFrom, validUntil } = entry.state;
      duty[id] = {
        person: person?.id ?? null,
        display_name: person?.displayName ?? null,
        ...(validFrom ? { valid_from: validFrom } : {}),
        ...(validUntil ? { valid_until: validUntil } : {}),
        stale: entry.stale,
      };
    }
    return c.json(duty);
  });

  // The payload is ignored: a push only triggers a re-poll of the provider.
  app.post('/events/:providerId', (c) => {
    const providerId = c.req.param('providerId');
    if (!reconciler.refresh(providerId)) {
      logger.warn(`Event for unknown provider ${providerId}`);
      return c.json({ error: `unknown provider: ${providerId}` }, 404);
    }
    logger.info('Push event accepted; refresh scheduled', { provider: providerId });
    return c.json({ status: 'accepted' }, 202);
  });

  app.notFound((c) => c.json({ error: 'not found' }, 404));

  app.onError((err, c) => {
    logger.error(`Unhandled error serving ${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ error: 'internal error' }, 500);
  });

  return app;
}
