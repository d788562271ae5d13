import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { AppError } from './lib/errors';
import type { AppDependencies } from './lib/dependencies';
import { createFileRoutes } from './routes/files';
import { createKnowledgeBaseRoutes } from './routes/knowledge-bases';
import { createQueryRoutes } from './routes/query';
import { createSystemRoutes } from './routes/system';

export interface AppOptions {
  /** hono/logger request lines; tests turn them off. */
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies, options: AppOptions = {}) {
  const app = new Hono();

  // Middleware
  if (options.requestLogging ?? true) {
    app.use('*', logger());
  }
  app.use('*', cors());

  app.route('/', createSystemRoutes(deps));

  const api = new Hono();
  api.route('/knowledge-bases', createKnowledgeBaseRoutes(deps));
  api.route('/query', createQueryRoutes(deps));
  api.route('/', createFileRoutes(deps));
  app.route('/api', api);

  app.notFound((c) => c.json({ detail: `Route not found: ${c.req.method} ${c.req.path}`, code: 'NOT_FOUND' }, 404));

  // Every failure leaves as { detail, code }.
  app.onError((err, c) => {
    if (AppError.isAppError(err)) {
      if (err.statusCode >= 500) {
        console.error(`[api] ${c.req.method} ${c.req.path} failed: ${err.message}`);
      }
      return c.json({ detail: err.message, code: err.code }, err.statusCode);
    }

    if (err instanceof HTTPException) {
      return c.json({ detail: err.message || 'Request failed', code: 'HTTP_ERROR' }, err.status);
    }

    console.error(`[api] ${c.req.method} ${c.req.path} unhandled error:`, err);
    return c.json({ detail: err.message || 'Internal server error', code: 'INTERNAL' }, 500);
  });

  return app;
}

export type { AppDependencies } from './lib/dependencies';
export { createDependencies } from './lib/dependencies';
