import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ScrapeEngine } from '../services/scraping/engine';
import { requireApiSecret } from '../utils/auth';

const RunBody = z.object({
  urls: z.array(z.string().url()).max(200),
  concurrency: z.number().int().min(1).max(10).optional(),
});

const PageBody = z.object({ url: z.string().url() });

export function scrapeRouter(engine: ScrapeEngine, apiSecret: string | null) {
  const router = Router();
  router.use(requireApiSecret(apiSecret));

  // Waits for the whole batch; per-URL failures are in the report, not a 5xx.
  router.post('/run', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { urls, concurrency } = RunBody.parse(req.body ?? {});
      const report = await engine.runBatch(urls, { concurrency });
      res.json({ status: 'ok', ...report, ...engine.getMeta() });
    } catch (err) {
      next(err);
    }
  });

  router.post('/page', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { url } = PageBody.parse(req.body ?? {});
      const { records, reconciled } = await engine.scrapePage(url);
      res.json({
        status: 'ok',
        records,
        created: reconciled.filter((r) => r.action === 'created').length,
        updated: reconciled.filter((r) => r.action === 'updated').length,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
