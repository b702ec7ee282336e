import { Router, Request, Response } from 'express';
import pino from 'pino';
import { z } from 'zod';
import type { PageRepository } from '../db/repositories/types.js';
import type { ScanQueue } from '../services/jobs/scan-queue.js';
import type { SweepSummary } from '../services/jobs/sweep.js';
import { validate } from '../middleware/validation.js';
import { PageNotFoundError } from '../utils/errors.js';

const log = pino({ name: 'scans-route' });

const triggerScanSchema = z.object({
  depth: z.enum(['quick', 'deep']).optional(),
});

export interface ScansRouterDeps {
  pages: PageRepository;
  queue: Pick<ScanQueue, 'trigger'>;
  sweep: () => Promise<SweepSummary>;
}

export function createScansRouter(deps: ScansRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/pages/:id/scans: manual scan trigger.
   *
   * Body: { depth?: 'quick' | 'deep' }
   * 202 when queued, 409 when the page is already queued or running.
   */
  router.post('/pages/:id/scans', validate(triggerScanSchema), async (req: Request, res: Response) => {
    const pageId = req.params.id;
    const page = await deps.pages.findById(pageId, 'live');
    if (!page) throw new PageNotFoundError(pageId);

    const { depth } = triggerScanSchema.parse(req.body);
    const result = deps.queue.trigger(pageId, { depth });
    log.info({ pageId, depth, result }, 'Manual scan trigger');

    if (result.status === 'skipped') {
      res.status(409).json(result);
      return;
    }
    res.status(202).json(result);
  });

  /**
   * POST /api/sweep: run the scheduled sweep now.
   */
  router.post('/sweep', async (_req: Request, res: Response) => {
    const summary = await deps.sweep();
    res.status(202).json(summary);
  });

  return router;
}
