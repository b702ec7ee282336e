import express from 'express';
import helmet from 'helmet';
import pino from 'pino';
import type { Repositories } from './db/repositories/types.js';
import type { ScanQueue } from './services/jobs/scan-queue.js';
import type { SweepSummary } from './services/jobs/sweep.js';
import { requireApiToken } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createScansRouter } from './routes/scans.js';
import { createIssuesRouter } from './routes/issues.js';
import { createStatusRouter } from './routes/status.js';

const logger = pino({ name: 'http' });

export interface AppDeps {
  apiToken: string;
  repos: Pick<Repositories, 'pages' | 'issues'>;
  queue: Pick<ScanQueue, 'trigger' | 'stats'>;
  sweep: () => Promise<SweepSummary>;
  checkDatabase: () => Promise<void>;
  clock?: () => Date;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Security headers
  app.use(helmet());
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, 'request');
    next();
  });

  // Public routes (no auth required)
  app.use(createHealthRouter(deps.checkDatabase));

  // Protected routes
  const auth = requireApiToken(deps.apiToken);
  app.use('/api', auth, createScansRouter({ pages: deps.repos.pages, queue: deps.queue, sweep: deps.sweep }));
  app.use('/api/issues', auth, createIssuesRouter(deps.repos.issues, deps.clock));
  app.use('/api/status', auth, createStatusRouter(deps.queue));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
