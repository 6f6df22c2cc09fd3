import { Router } from 'express';
import type { RepositoryFactory } from '@tiered/storage';
import type { MonitorStatistics } from '../monitor/stale-order-monitor.js';
import { asyncHandler } from '../middleware/errorHandler.js';

export interface StatusDeps {
  factory: RepositoryFactory;
  monitorStatistics: () => MonitorStatistics;
  isShuttingDown: () => boolean;
}

export function createStatusRouter(deps: StatusDeps) {
  const router = Router();

  router.get('/health', (_req, res) => {
    const shuttingDown = deps.isShuttingDown();
    res.status(shuttingDown ? 503 : 200).json({
      status: shuttingDown ? 'shutting_down' : 'ok',
      timestamp: new Date().toISOString(),
      backends: deps.factory.backendSummary(),
    });
  });

  router.get(
    '/api/v1/stats',
    asyncHandler(async (_req, res) => {
      res.json({
        repositories: await deps.factory.statistics(),
        monitor: deps.monitorStatistics(),
      });
    })
  );

  return router;
}
