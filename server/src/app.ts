import express from 'express';
import cors from 'cors';
import { ZodError } from 'zod';

import type { StoreProvider } from './db/store';
import { AppError } from './errors';
import { silentLogger } from './logger';
import type { Logger } from './logger';
import { healthRouter } from './routes/health';
import { restaurantsRouter } from './routes/restaurants';
import { scrapeRouter } from './routes/scrape';
import type { ScrapeEngine } from './services/scraping/engine';

export interface AppDeps {
  storeProvider: StoreProvider;
  engine: ScrapeEngine;
  apiSecret: string | null;
  logger?: Logger;
}

export function createApp({ storeProvider, engine, apiSecret, logger = silentLogger }: AppDeps) {
  const log = logger.child({ component: 'http' });
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    const started = Date.now();
    const path = `${req.method} ${req.originalUrl}`;
    log.debug({ path }, 'req:start');
    res.on('finish', () => {
      log.info({ path, status: res.statusCode, ms: Date.now() - started }, 'req:done');
    });
    next();
  });

  app.use('/health', healthRouter(() => engine.getMeta()));
  app.use('/api/restaurants', restaurantsRouter(storeProvider));
  app.use('/api/scrape', scrapeRouter(engine, apiSecret));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Eater Ingest API',
      status: 'ok',
      time: new Date().toISOString(),
      endpoints: [
        'GET /health',
        'GET /api/restaurants',
        'GET /api/restaurants/:id',
        'POST /api/scrape/run (x-api-secret or Bearer)',
        'POST /api/scrape/page (x-api-secret or Bearer)',
      ],
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ error: 'Invalid request', details: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`) });
      return;
    }
    if (err instanceof AppError) {
      if (err.statusCode >= 500) log.error({ code: err.code, err: err.message }, 'Request failed');
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }
    log.error({ err }, 'Unhandled error');
    res.status(500).json({ error: err instanceof Error ? err.message : 'Internal Server Error' });
  });

  return app;
}
