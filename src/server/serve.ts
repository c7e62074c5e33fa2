import { serve } from '@hono/node-server';
import type { Hono } from 'hono';
import type { Server } from 'node:net';
import { TransportError } from '../errors.js';
import type { LoggerLike } from '../logging/logger.js';

export interface RunningServer {
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Bind the app to host:port. Rejects with TransportError when the port
 * cannot be bound.
 */
export function startServer(
  app: Hono,
  opts: { host: string; port: number },
  logger: LoggerLike,
): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = serve({ fetch: app.fetch, hostname: opts.host, port: opts.port }, (info) => {
      logger.info(`Listening on http://${opts.host}:${info.port}`);
      resolve({ port: info.port, close: () => closeServer(server) });
    });

    server.once('error', (err: Error) => {
      reject(new TransportError(`Cannot listen on ${opts.host}:${opts.port}: ${err.message}`, { cause: err }));
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
