import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createAdminRouter } from './admin/routes.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createObservationsRouter } from './observations/routes.js';
import { createStatusRouter, type StatusDeps } from './status/routes.js';

export interface AppOptions extends StatusDeps {
  /** Requests per minute per client on /api. */
  rateLimitPerMinute?: number;
}

export function createApp(options: AppOptions) {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: options.rateLimitPerMinute ?? 600,
    message: { error: { code: 'RATE_LIMIT', message: 'Too many requests' } },
  });
  app.use('/api', limiter);

  app.use(createStatusRouter(options));
  app.use('/api/v1/observations', createObservationsRouter(options.factory));
  app.use('/api/v1/admin', createAdminRouter(options.factory));

  app.use(errorHandler);

  return app;
}
