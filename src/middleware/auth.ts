import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import pino from 'pino';

const log = pino({ name: 'auth' });

/**
 * requireApiToken middleware: operator endpoints need
 * `Authorization: Bearer <API_TOKEN>`. Returns 401 otherwise.
 */
export function requireApiToken(apiToken: string) {
  const correctBuf = Buffer.from(apiToken);

  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.get('authorization') ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    // Constant-time comparison
    const inputBuf = Buffer.from(match[1]);

    // timingSafeEqual throws on a length mismatch
    const isCorrectLength = inputBuf.length === correctBuf.length;
    const isMatch = isCorrectLength && crypto.timingSafeEqual(inputBuf, correctBuf);

    if (!isMatch) {
      log.warn({ method: req.method, url: req.url }, 'Rejected request with invalid API token');
      res.status(401).json({ error: 'Invalid API token' });
      return;
    }
    next();
  };
}
