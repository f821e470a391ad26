import { setTimeout as sleep } from 'node:timers/promises';
import { RecordCache } from '../cache.js';
import { PriceSink } from '../metrics/prices.js';
import { parsePriceFeed } from '../parsers/prices.js';
import { parseStationFeed } from '../parsers/stations.js';
import { JoinedTuple, Logger, PriceRecord, StationTable } from '../types/index.js';
import { formatDuration } from '../utils/dates.js';
import { FeedFetcher, fetchFeed } from './feeds.js';

export type RefreshDependencies = {
  cache: Pick<RecordCache, 'put'>;
  sink: PriceSink;
  pricesUrl: string;
  stationsUrl: string;
  stationHeaderLines?: number;
  fetcher?: FeedFetcher;
  logger?: Logger;
};

export type LoopDependencies = RefreshDependencies & {
  intervalMs: number;
  signal?: AbortSignal;
};

export type IterationOutcome =
  | { ok: true; emitted: number }
  | { ok: false; stage: 'prices' | 'stations' | 'emit'; error: unknown };

export const joinRecords = (records: PriceRecord[], stations: StationTable): JoinedTuple[] =>
  records.map((record) => {
    const station = stations.get(record.stationId);

    return {
      record,
      name: station?.name ?? '',
      type: station?.type ?? '',
      municipality: station?.municipality ?? '',
      province: station?.province ?? '',
      brand: station?.brand ?? ''
    };
  });

export const runIteration = async (deps: RefreshDependencies): Promise<IterationOutcome> => {
  const { cache, sink, fetcher = fetchFeed, logger = console } = deps;

  let records: PriceRecord[];
  try {
    const body = await fetcher(deps.pricesUrl, 'prices');
    records = parsePriceFeed(body, cache);
  } catch (error) {
    logger.error('Failed to fetch prices:', describe(error));
    return { ok: false, stage: 'prices', error };
  }

  let stations: StationTable;
  try {
    const body = await fetcher(deps.stationsUrl, 'stations');
    stations = parseStationFeed(body, { headerLines: deps.stationHeaderLines, logger });
  } catch (error) {
    logger.error('Failed to update stations:', describe(error));
    return { ok: false, stage: 'stations', error };
  }

  const tuples = joinRecords(records, stations);
  try {
    tuples.forEach((tuple) => sink.observe(tuple));
  } catch (error) {
    logger.error('Failed to publish prices:', describe(error));
    return { ok: false, stage: 'emit', error };
  }

  logger.log(`Refreshed ${tuples.length} prices across ${stations.size} stations`);
  return { ok: true, emitted: tuples.length };
};

export const startRefreshLoop = async (deps: LoopDependencies): Promise<void> => {
  const { intervalMs, signal, logger = console } = deps;

  while (!signal?.aborted) {
    await runIteration(deps);

    logger.log(`Sleeping for ${formatDuration(intervalMs)}`);
    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw error;
    }
  }
};

function describe(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
