import { Router } from 'express';
import { RecordCache } from '../cache.js';

export const createHealthRouter = (cache: Pick<RecordCache, 'size'>) => {
  const healthRouter = Router();

  healthRouter.get('/', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), cachedKeys: cache.size });
  });

  return healthRouter;
};
