import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { IssueRepository } from '../db/repositories/types.js';
import { validate } from '../middleware/validation.js';
import { acknowledgeIssue, reopenIssue, resolveIssueManually } from '../services/lifecycle/issue-status.js';

const acknowledgeSchema = z.object({
  by: z.string().trim().min(1).max(200).optional(),
});

export function createIssuesRouter(issues: IssueRepository, clock: () => Date = () => new Date()): Router {
  const router = Router();

  // POST /api/issues/:id/acknowledge  Body: { by?: string }
  router.post('/:id/acknowledge', validate(acknowledgeSchema), async (req: Request, res: Response) => {
    const { by } = acknowledgeSchema.parse(req.body);
    const issue = await acknowledgeIssue(issues, req.params.id, by ?? null, clock());
    res.json(issue);
  });

  // POST /api/issues/:id/resolve
  router.post('/:id/resolve', async (req: Request, res: Response) => {
    const issue = await resolveIssueManually(issues, req.params.id, clock());
    res.json(issue);
  });

  // POST /api/issues/:id/reopen
  router.post('/:id/reopen', async (req: Request, res: Response) => {
    const issue = await reopenIssue(issues, req.params.id);
    res.json(issue);
  });

  return router;
}
