#!/usr/bin/env node

// length-gate HTTP server entry point

import { loadStreamingConfig } from './config/streaming-config.js';
import { DEFAULT_PORT } from './shared/config.js';
import { createLogger } from './shared/debug.js';
import { createSimilarityServer, startWebServer } from './web/server.js';

const logger = createLogger('http');

const port = parseInt(process.env.LENGTH_GATE_PORT || String(DEFAULT_PORT), 10);
const app = createSimilarityServer({ defaults: loadStreamingConfig(), logger });

startWebServer(app, Number.isNaN(port) ? DEFAULT_PORT : port, logger).then(
  ({ server }) => {
    const shutdown = (): void => {
      server.close(() => process.exit(0));
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  },
  (err: Error) => {
    logger.error('Fatal: failed to start server', { error: err.message });
    process.exit(1);
  },
);

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { error: err.message });
  process.exit(1);
});
