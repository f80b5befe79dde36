/**
 * Node listener for the HTTP app.
 *
 * @packageDocumentation
 */

import { serve, type ServerType } from '@hono/node-server';
import type { Hono } from 'hono';
import type { ServerLogger } from '../logging.js';
import type { HttpAppEnv } from './app.js';

/**
 * Options for starting the HTTP listener.
 */
export interface StartHttpServerOptions {
  app: Hono<HttpAppEnv>;
  host: string;
  port: number;
  logger: ServerLogger;
}

/**
 * Starts listening and resolves once the socket is bound.
 *
 * @param options - Listener options.
 * @returns The running Node server.
 * @throws The listen error (e.g. EADDRINUSE) when binding fails.
 */
export function startHttpServer(options: StartHttpServerOptions): Promise<ServerType> {
  const { app, host, port, logger } = options;

  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
      server.off('error', reject);
      logger.info('http_listening', { host, port: info.port });
      resolve(server);
    });
    server.once('error', reject);
  });
}
