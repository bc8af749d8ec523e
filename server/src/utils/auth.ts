import type { Request, Response, NextFunction } from 'express';

export function checkApiSecret(req: Request, expected: string | null) {
  const header = req.get('x-api-secret') ?? '';
  const auth = req.get('authorization') ?? '';
  const fromHeader = header.trim();
  const fromBearer = auth.toLowerCase().startsWith('bearer ')
    ? auth.slice(7).trim()
    : '';
  const provided = fromHeader || fromBearer;
  const want = (expected ?? '').trim();
  return Boolean(provided) && Boolean(want) && provided === want;
}

/** Rejects every request when no secret is configured. */
export function requireApiSecret(expected: string | null) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!checkApiSecret(req, expected)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}
