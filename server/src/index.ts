import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { getConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { captureError, flushSentry, initSentry } from './lib/sentry.js';
import { createRuntime, type Runtime } from './runtime.js';

let server: ReturnType<typeof serve> | null = null;
let runtime: Runtime | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  const activeRuntime = runtime;
  const flushTasks = Promise.allSettled([
    activeRuntime ? activeRuntime.shutdown() : Promise.resolve(),
    flushSentry(2000),
  ]).then((results) => {
    const drain = results[0];
    if (drain.status === 'rejected') {
      logger.warn({
        error: drain.reason instanceof Error ? drain.reason.message : String(drain.reason),
      }, 'Pipeline drain failed during shutdown');
    }
  });

  // Close HTTP server (stop accepting new connections)
  server.close(() => {
    void Promise.race([
      flushTasks,
      new Promise((resolve) => setTimeout(resolve, 5_000)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Force exit if connections or workers don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 15_000).unref();
}

export function startServer() {
  if (server) return server;

  const config = getConfig();
  initSentry(config.sentryDsn, config.nodeEnv);
  runtime = createRuntime(config);

  const app = createApp({
    repository: runtime.repository,
    orchestrator: runtime.orchestrator,
    uploads: runtime.uploads,
    maxUploadBytes: config.maxUploadBytes,
    allowedOrigins: config.allowedOrigins,
    isShuttingDown: () => shuttingDown,
  });

  logger.info({ port: config.port }, 'Resume ingest server starting');
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    captureError(err, { source: 'uncaughtException' });
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
