import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { DocumentRepository } from './lib/document-repository.js';
import logger from './lib/logger.js';
import { captureError } from './lib/sentry.js';
import type { UploadStore } from './lib/upload-store.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import type { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { createAnalyticsRoutes } from './routes/analytics.js';
import { createMatchRoutes } from './routes/matches.js';
import { createResumeRoutes } from './routes/resumes.js';

export interface AppDeps {
  repository: DocumentRepository;
  orchestrator: PipelineOrchestrator;
  uploads: UploadStore;
  maxUploadBytes: number;
  allowedOrigins?: string[];
  /** Set once shutdown starts; new work is refused with 503. */
  isShuttingDown?: () => boolean;
}

export function createApp(deps: AppDeps) {
  const { repository } = deps;
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (deps.isShuttingDown?.() && c.req.path !== '/api/v1/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', cors({ origin: deps.allowedOrigins ?? [] }));

  app.get('/api/v1/health', async (c) => {
    let dbOk = false;
    try {
      dbOk = await repository.ping();
    } catch (err) {
      logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Health check: storage ping failed');
    }
    return c.json({ api_status: 'ok', db_status: dbOk ? 'ok' : 'error', storage: repository.name });
  });

  app.route('/api/v1/resumes', createResumeRoutes(deps));
  app.route('/api/v1/matches', createMatchRoutes(repository));
  app.route('/api/v1/analytics', createAnalyticsRoutes(repository));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
