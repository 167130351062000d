/**
 * @fileoverview Express app for the dashboard API.
 *
 * Built from an explicit store so tests can drive it in-process without
 * listening on a port.
 */

import express, { type ErrorRequestHandler } from 'express';
import { createAdminRouter } from './admin/index.js';
import type { AssistantStore } from './services/store/index.js';
import { createLogger } from './utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

/**
 * Malformed request bodies get 400; anything else that escaped a handler
 * gets 500. Both answer with `{ error }`.
 */
const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : 500;

  if (status >= 500) {
    logger.error('http_request_failed', { error });
    res.status(500).json({ error: 'Internal server error' });
    return;
  }
  res.status(status).json({ error: 'Invalid request body' });
};

export function createApp(store: AssistantStore): express.Application {
  const app = express();

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Admin routes (tasks, memories)
  app.use(createAdminRouter(store));

  app.use(handleError);

  return app;
}
