import { Router, Request, Response } from 'express';
import { getJobStatuses } from '../services/jobs/scheduler.js';
import type { ScanQueue } from '../services/jobs/scan-queue.js';

/**
 * GET /api/status: background job state and scan queue depth.
 */
export function createStatusRouter(queue: Pick<ScanQueue, 'stats'>): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      queue: queue.stats(),
      jobs: getJobStatuses(),
    });
  });

  return router;
}
