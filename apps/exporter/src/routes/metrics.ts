import { Router } from 'express';
import { Registry } from 'prom-client';

export const createMetricsRouter = (registry: Registry) => {
  const metricsRouter = Router();

  metricsRouter.get('/', async (_req, res, next) => {
    try {
      const body = await registry.metrics();
      res.set('Content-Type', registry.contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  });

  return metricsRouter;
};
