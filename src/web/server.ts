/**
 * Hono HTTP adapter for the similarity calculators.
 *
 * Registers the similarity routes and a health check. The adapter only
 * marshals JSON in and out; every computation happens in the core.
 *
 * @module web/server
 */

import { Hono } from 'hono';
import { serve } from '@hono/node-server';

import { DEFAULT_PORT } from '../shared/config.js';
import { noopLogger, type Logger } from '../shared/debug.js';
import type { StreamingConfigInput } from '../shared/types.js';
import { similarityRoutes, type AppEnv } from './routes/similarity.js';

/** Streaming requests are cancelled after this long. */
export const REQUEST_TIMEOUT_MS = 30_000;

export interface SimilarityServerOptions {
  /** Streaming defaults, usually from loadStreamingConfig(). */
  defaults?: StreamingConfigInput;
  logger?: Logger;
  requestTimeoutMs?: number;
}

/**
 * Creates the Hono app with request logging, the health check and the
 * similarity routes.
 */
export function createSimilarityServer(options: SimilarityServerOptions = {}): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const logger = options.logger ?? noopLogger;
  const defaults = options.defaults ?? {};
  const requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;

  app.use('*', async (c, next) => {
    const start = performance.now();
    c.set('defaults', defaults);
    c.set('logger', logger);
    c.set('requestTimeoutMs', requestTimeoutMs);
    await next();
    logger.info('Request processed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Math.round(performance.now() - start),
    });
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: Date.now() });
  });

  app.route('/', similarityRoutes);

  app.onError((err, c) => {
    logger.error('Request failed', { path: c.req.path, error: err.message });
    return c.json({ error: 'internal server error' }, 500);
  });

  return app;
}

/**
 * Maximum number of alternate ports to try when the primary port is in use.
 */
const MAX_PORT_RETRIES = 10;

/**
 * Starts the app on `port`, moving up one port at a time (at most
 * MAX_PORT_RETRIES times) while the chosen one is in use.
 *
 * Resolves with the port the server ended up listening on.
 */
export function startWebServer(
  app: Hono<AppEnv>,
  port: number = DEFAULT_PORT,
  logger: Logger = noopLogger,
): Promise<{ server: ReturnType<typeof serve>; port: number }> {
  logger.debug(`Starting web server on port ${port}`);

  return new Promise((resolve, reject) => {
    function tryListen(attemptPort: number, retries: number): void {
      const server = serve({
        fetch: app.fetch,
        port: attemptPort,
      });

      server.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE' && retries > 0) {
          server.close();
          const nextPort = attemptPort + 1;
          logger.debug(`Port ${attemptPort} in use, trying ${nextPort}`);
          tryListen(nextPort, retries - 1);
        } else if (err.code === 'EADDRINUSE') {
          server.close();
          reject(new Error(`all ports ${port}-${attemptPort} are in use`));
        } else {
          logger.error(`Web server error: ${err.message}`);
          reject(err);
        }
      });

      server.on('listening', () => {
        const addr = server.address();
        const actualPort = typeof addr === 'object' && addr ? addr.port : attemptPort;
        logger.info(`Web server listening on http://localhost:${actualPort}`);
        resolve({ server, port: actualPort });
      });
    }

    tryListen(port, MAX_PORT_RETRIES);
  });
}
