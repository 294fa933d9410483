/**
 * HTTP application
 *
 * Observation ingress, owner-facing alert routes and health endpoints on a
 * single express app.
 */

import express, { type Express } from 'express';
import type { Logger } from 'pino';
import { createErrorHandler, notFoundHandler } from './middleware.js';
import { createAlertsRouter, type AlertRoutesDeps } from './routes/alerts.routes.js';
import { createHealthRouter, type HealthChecker } from './routes/health.routes.js';
import { createIngressRouter, type IngressDeps } from './routes/ingress.routes.js';

export interface AppDeps extends AlertRoutesDeps {
  publisher: IngressDeps['publisher'];
  health: HealthChecker;
  logger: Logger;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(express.json({ limit: '256kb' }));

  app.use(createHealthRouter(deps.health));
  app.use(createIngressRouter({ publisher: deps.publisher, logger: deps.logger }));
  app.use(createAlertsRouter({ store: deps.store, owner: deps.owner, monitor: deps.monitor }));

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.logger));

  return app;
}
