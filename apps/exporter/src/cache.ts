import NodeCache from 'node-cache';
import { PriceRecord } from './types/index.js';
import { toUnixSeconds } from './utils/dates.js';

type CacheEntry = {
  records: PriceRecord[];
  createdAt: number;
};

export type CacheLookup =
  | { found: true; records: PriceRecord[] }
  | { found: false; reason: 'missing' | 'expired' };

export type RecordCacheOptions = {
  ttlMs: number;
  now?: () => number;
};

export const cacheKey = (record: PriceRecord) => `${record.stationId}-${toUnixSeconds(record.observedAt)}`;

// Entries never leave the store. Past the TTL they read as absent, but a later
// `put` still appends to them and keeps their creation time.
export class RecordCache {
  private readonly store = new NodeCache({ stdTTL: 0, checkperiod: 0, useClones: false });
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor({ ttlMs, now = Date.now }: RecordCacheOptions) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  put(key: string, record: PriceRecord) {
    const entry = this.store.get<CacheEntry>(key);
    if (entry) {
      entry.records.push(record);
      return;
    }

    this.store.set<CacheEntry>(key, { records: [record], createdAt: this.now() });
  }

  get(key: string): CacheLookup {
    const entry = this.store.get<CacheEntry>(key);
    if (!entry) {
      return { found: false, reason: 'missing' };
    }

    if (this.now() - entry.createdAt > this.ttlMs) {
      return { found: false, reason: 'expired' };
    }

    return { found: true, records: [...entry.records] };
  }

  get size() {
    return this.store.keys().length;
  }
}
