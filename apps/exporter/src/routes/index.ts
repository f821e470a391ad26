import { Router } from 'express';
import { Registry } from 'prom-client';
import { RecordCache } from '../cache.js';
import { createHealthRouter } from './health.js';
import { createMetricsRouter } from './metrics.js';

export type RouterDependencies = {
  registry: Registry;
  cache: Pick<RecordCache, 'size'>;
  metricsPath: string;
};

export const createRouter = ({ registry, cache, metricsPath }: RouterDependencies) => {
  const router = Router();

  router.use('/health', createHealthRouter(cache));
  router.use(metricsPath, createMetricsRouter(registry));

  return router;
};
