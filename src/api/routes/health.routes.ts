/**
 * Health Routes
 *
 * Liveness, readiness and Prometheus metrics for the escalation service.
 */

import { Router, type Request, type Response } from 'express';
import type { ConsumerStats } from '../../consumers/index.js';
import { collectMetrics, registry } from '../../infrastructure/metrics.js';
import { asyncHandler } from '../middleware.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface HealthChecker {
  getNatsStatus: () => { connected: boolean };
  getConsumerStats: () => ConsumerStats;
  getStoreStatus: () => Promise<boolean>;
  getStartTime: () => number;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: number;
  checks: {
    nats: { connected: boolean };
    store: { healthy: boolean };
    consumer: ConsumerStats;
    memory: { heapUsed: number; heapTotal: number; rss: number };
  };
  uptime: number;
}

// --------------------------------------------------------------------------
// Router
// --------------------------------------------------------------------------

export function createHealthRouter(checker: HealthChecker): Router {
  const router = Router();

  router.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const health = await getHealthStatus(checker);
      res.status(health.status === 'healthy' ? 200 : 503).json(health);
    })
  );

  router.get(
    '/ready',
    asyncHandler(async (_req: Request, res: Response) => {
      const storeHealthy = await checker.getStoreStatus();
      const ready = storeHealthy && checker.getNatsStatus().connected;
      res.status(ready ? 200 : 503).json({ ready, timestamp: Date.now() });
    })
  );

  router.get(
    '/metrics',
    asyncHandler(async (_req: Request, res: Response) => {
      res.set('Content-Type', registry.contentType);
      res.send(await collectMetrics());
    })
  );

  return router;
}

async function getHealthStatus(checker: HealthChecker): Promise<HealthStatus> {
  const nats = checker.getNatsStatus();
  const consumer = checker.getConsumerStats();
  const storeHealthy = await checker.getStoreStatus();
  const mem = process.memoryUsage();

  const healthy = nats.connected && consumer.running && storeHealthy;

  return {
    status: healthy ? 'healthy' : 'unhealthy',
    timestamp: Date.now(),
    checks: {
      nats,
      store: { healthy: storeHealthy },
      consumer,
      memory: { heapUsed: mem.heapUsed, heapTotal: mem.heapTotal, rss: mem.rss },
    },
    uptime: Date.now() - checker.getStartTime(),
  };
}
