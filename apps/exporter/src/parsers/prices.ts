import { parse } from 'csv-parse/sync';
import { cacheKey, RecordCache } from '../cache.js';
import { FEED_DELIMITER, PRICE_FIELD_COUNT, PRICE_HEADER_LINES } from '../constants/feeds.js';
import { FeedError, MalformedFieldError, MalformedRowError } from '../errors.js';
import { PriceRecord } from '../types/index.js';
import { parseObservationTime } from '../utils/dates.js';
import { parseBoolean, parseInteger } from '../utils/fields.js';
import { parsePrice } from '../utils/pricing.js';
import { skipLines } from './lines.js';

const isFieldList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((field) => typeof field === 'string');

export const parsePriceRow = (items: string[], line: number): PriceRecord => {
  if (items.length !== PRICE_FIELD_COUNT) {
    throw new MalformedRowError('prices', `Expected ${PRICE_FIELD_COUNT} fields, got ${items.length}`, line);
  }

  const [rawStationId, fuelType, rawPrice, rawSelfService, rawObservedAt] = items;

  const stationId = parseInteger(rawStationId);
  if (stationId === null) {
    throw new MalformedFieldError('prices', 'station id', rawStationId, line);
  }

  const price = parsePrice(rawPrice);
  if (price === null) {
    throw new MalformedFieldError('prices', 'price', rawPrice, line);
  }

  const selfService = parseBoolean(rawSelfService);
  if (selfService === null) {
    throw new MalformedFieldError('prices', 'self service flag', rawSelfService, line);
  }

  const observedAt = parseObservationTime(rawObservedAt);
  if (!observedAt) {
    throw new MalformedFieldError('prices', 'observation time', rawObservedAt, line);
  }

  return { stationId, fuelType, price, selfService, observedAt };
};

// Rows go into the cache as csv-parse emits them, so rows read before a
// failure stay cached.
export const parsePriceFeed = (body: string, cache: Pick<RecordCache, 'put'>): PriceRecord[] => {
  const rest = skipLines('prices', body, PRICE_HEADER_LINES);
  const records: PriceRecord[] = [];
  const outcome: { failure?: FeedError } = {};

  const register = (items: unknown, { lines }: { lines: number }) => {
    const line = PRICE_HEADER_LINES + lines;
    try {
      if (!isFieldList(items)) {
        throw new MalformedRowError('prices', 'Unexpected CSV reader output', line);
      }
      const record = parsePriceRow(items, line);
      records.push(record);
      cache.put(cacheKey(record), record);
      return items;
    } catch (error) {
      if (error instanceof FeedError) {
        outcome.failure = error;
      }
      throw error;
    }
  };

  try {
    parse(rest, {
      delimiter: FEED_DELIMITER,
      relax_column_count: true,
      skip_empty_lines: true,
      on_record: register
    });
  } catch (error) {
    if (outcome.failure) {
      throw outcome.failure;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedRowError('prices', `Unreadable CSV: ${reason}`, PRICE_HEADER_LINES + records.length + 1, {
      cause: error
    });
  }

  return records;
};
