import { Registry } from 'prom-client';
import { createApp } from './app.js';
import { RecordCache } from './cache.js';
import { loadConfig, loadEnvFiles } from './config.js';
import { createPriceGauge, PrometheusPriceSink } from './metrics/prices.js';
import { startRefreshLoop } from './services/refresh.js';

loadEnvFiles();
const config = loadConfig(process.env, process.argv.slice(2));

const registry = new Registry();
const sink = new PrometheusPriceSink(createPriceGauge(registry));
const cache = new RecordCache({ ttlMs: config.cacheTtlMs });

startRefreshLoop({
  cache,
  sink,
  pricesUrl: config.pricesUrl,
  stationsUrl: config.stationsUrl,
  stationHeaderLines: config.stationHeaderLines,
  intervalMs: config.refreshIntervalMs
}).catch((error: unknown) => {
  console.error('Refresh loop stopped unexpectedly:', error);
  process.exit(1);
});

const app = createApp({ registry, cache, metricsPath: config.metricsPath });
const { host, port } = config.listen;

const onListening = () => {
  console.log(`Serving ${config.metricsPath} on ${host ?? '*'}:${port}`);
};
const server = host ? app.listen(port, host, onListening) : app.listen(port, onListening);

server.on('error', (error) => {
  console.error('Metrics server failed:', error);
  process.exit(1);
});
