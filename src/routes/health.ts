import { Router } from 'express';

export function createHealthRouter(checkDatabase: () => Promise<void>): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    try {
      await checkDatabase();
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ status: 'error' });
    }
  });

  return router;
}
