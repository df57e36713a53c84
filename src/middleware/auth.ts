import { Request, Response, NextFunction } from 'express';
import { timingSafeEqual } from 'node:crypto';

/**
 * Shared-secret middleware for backend callers.
 *
 * Callers send the secret in the x-backend-key header. Requests without a
 * configured key are rejected outright.
 */
export function requireBackendKey(expectedKey: string | undefined) {
  const expected = expectedKey ? Buffer.from(expectedKey) : null;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expected) {
      res.status(503).json({ error: 'Backend key is not configured' });
      return;
    }

    const provided = req.header('x-backend-key');
    if (!provided) {
      res.status(401).json({ error: 'Missing x-backend-key header' });
      return;
    }

    const actual = Buffer.from(provided);
    if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
      res.status(401).json({ error: 'Invalid backend key', code: 'INVALID_BACKEND_KEY' });
      return;
    }

    next();
  };
}
