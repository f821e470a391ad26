export { createApp } from './app.js';
export { cacheKey, RecordCache } from './cache.js';
export type { CacheLookup, RecordCacheOptions } from './cache.js';
export { loadConfig } from './config.js';
export type { Config } from './config.js';
export { FeedError, FetchError, MalformedFieldError, MalformedRowError } from './errors.js';
export { createPriceGauge, PRICE_LABELS, PRICE_METRIC_NAME, PrometheusPriceSink } from './metrics/prices.js';
export type { PriceSink } from './metrics/prices.js';
export { parsePriceFeed } from './parsers/prices.js';
export { parseStationFeed } from './parsers/stations.js';
export { fetchFeed } from './services/feeds.js';
export { joinRecords, runIteration, startRefreshLoop } from './services/refresh.js';
export type { IterationOutcome } from './services/refresh.js';
export * from './types/index.js';
