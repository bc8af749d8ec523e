import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { withStore } from '../db/store';
import type { StoreProvider } from '../db/store';
import { NotFoundError } from '../errors';

const ListQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const IdParam = z.object({ id: z.coerce.number().int().positive() });

export function restaurantsRouter(storeProvider: StoreProvider) {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { skip, limit } = ListQuery.parse(req.query);
      const data = await withStore(storeProvider, (store) => store.listRestaurantsWithLlmInfo({ skip, limit }));
      res.json({ data, skip, limit });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParam.parse(req.params);
      const row = await withStore(storeProvider, (store) => store.getRestaurantWithLlmInfo(id));
      if (!row) throw new NotFoundError(`Restaurant ${id} not found`);
      res.json({ data: row });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
