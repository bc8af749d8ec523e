import { Router, Request, Response } from 'express';

export function healthRouter(meta: () => Record<string, unknown>) {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', time: new Date().toISOString(), ...meta() });
  });

  return router;
}
