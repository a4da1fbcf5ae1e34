import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import type { HealthResponse } from '@paperlens/shared';

import { createSearchRoutes, errorBody } from './routes/search';
import { createLogger } from './services/logger';
import type { PaperSearchFn } from './services/paper-search/types';

export const API_VERSION = '0.1.0';

const log = createLogger('Api');

export interface AppOptions {
  search: PaperSearchFn;
  allowedOrigins?: string[];
  /** Skip the per-request access log (tests) */
  quiet?: boolean;
}

function health(message: string): HealthResponse {
  return {
    status: 'ok',
    message,
    timestamp: new Date().toISOString(),
    version: API_VERSION,
  };
}

export function createApp(options: AppOptions) {
  const app = new Hono();

  // Middleware
  if (!options.quiet) {
    app.use('*', logger());
  }
  app.use('*', secureHeaders());
  app.use(
    '*',
    cors({
      origin: options.allowedOrigins ?? ['http://localhost:3000', 'http://localhost:5173'],
      credentials: true,
    })
  );

  app.get('/', (c) => c.json(health('PaperLens research paper search API')));

  // Health check
  app.get('/health', (c) => c.json(health('PaperLens paper search service is running')));
  app.get('/api/health', (c) => c.json(health('PaperLens paper search service is running')));

  // API Routes
  app.route('/api/search', createSearchRoutes(options.search));

  app.notFound((c) => c.json(errorBody('NOT_FOUND', 'Route not found'), 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(errorBody('BAD_REQUEST', err.message), err.status);
    }
    log.error('Unhandled error:', err);
    return c.json(
      errorBody(
        'INTERNAL_ERROR',
        process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message
      ),
      500
    );
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
