import { config as loadEnv } from 'dotenv';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { PRICES_CSV_URL, STATION_HEADER_LINES, STATIONS_CSV_URL } from './constants/feeds.js';
import { parseDuration } from './utils/dates.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const loadEnvIfExists = (path: string) => {
  if (existsSync(path)) {
    loadEnv({ path, override: true });
  }
};

const projectRoot = resolve(__dirname, '../../..');
const appRoot = resolve(__dirname, '..');

export const loadEnvFiles = () => {
  loadEnvIfExists(resolve(projectRoot, '.env'));
  loadEnvIfExists(resolve(projectRoot, '.env.local'));
  loadEnvIfExists(resolve(appRoot, '.env'));
};

const duration = (name: string) =>
  z.string().transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === null || ms <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a positive duration such as 6h or 30m` });
      return z.NEVER;
    }
    return ms;
  });

const listenAddress = z
  .string()
  .regex(/^(.*):(\d{1,5})$/, 'LISTEN_ADDRESS must look like host:port or :port')
  .transform((value) => {
    const separator = value.lastIndexOf(':');
    const host = value.slice(0, separator).replace(/^\[(.*)\]$/, '$1');
    return { host: host || undefined, port: Number(value.slice(separator + 1)) };
  })
  .refine(({ port }) => port <= 65535, 'LISTEN_ADDRESS port is out of range');

const envSchema = z.object({
  METRICS_PATH: z.string().startsWith('/').default('/metrics'),
  LISTEN_ADDRESS: z.string().default(':9112').pipe(listenAddress),
  REFRESH_INTERVAL: z.string().default('6h').pipe(duration('REFRESH_INTERVAL')),
  CACHE_TTL: z.string().default('1h').pipe(duration('CACHE_TTL')),
  PRICES_CSV_URL: z.string().url().default(PRICES_CSV_URL),
  STATIONS_CSV_URL: z.string().url().default(STATIONS_CSV_URL),
  STATIONS_HEADER_LINES: z.coerce.number().int().min(0).default(STATION_HEADER_LINES)
});

export type Config = {
  metricsPath: string;
  listen: { host?: string; port: number };
  refreshIntervalMs: number;
  cacheTtlMs: number;
  pricesUrl: string;
  stationsUrl: string;
  stationHeaderLines: number;
};

// Flags win over METRICS_PATH, LISTEN_ADDRESS and REFRESH_INTERVAL.
export const loadConfig = (env: NodeJS.ProcessEnv, argv: string[] = []): Config => {
  const { values: flags } = parseArgs({
    args: argv,
    options: {
      path: { type: 'string', short: 'p' },
      listen: { type: 'string', short: 'l' },
      interval: { type: 'string', short: 'i' }
    },
    strict: true,
    allowPositionals: false
  });

  const parsed = envSchema.parse({
    ...env,
    METRICS_PATH: flags.path ?? env.METRICS_PATH,
    LISTEN_ADDRESS: flags.listen ?? env.LISTEN_ADDRESS,
    REFRESH_INTERVAL: flags.interval ?? env.REFRESH_INTERVAL
  });

  return {
    metricsPath: parsed.METRICS_PATH,
    listen: parsed.LISTEN_ADDRESS,
    refreshIntervalMs: parsed.REFRESH_INTERVAL,
    cacheTtlMs: parsed.CACHE_TTL,
    pricesUrl: parsed.PRICES_CSV_URL,
    stationsUrl: parsed.STATIONS_CSV_URL,
    stationHeaderLines: parsed.STATIONS_HEADER_LINES
  };
};
