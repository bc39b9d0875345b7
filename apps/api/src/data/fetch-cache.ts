import { FetchResult } from './data.types';

export interface CacheRecord<T> {
  value: T;
  storedAt: number;
  ttlMs: number;
}

export interface FetchCache {
  get(key: string, now: number): FetchResult | undefined;
  set(key: string, value: FetchResult, now: number): void;
}

export const FETCH_CACHE = Symbol('FETCH_CACHE');

export const fetchCacheKey = (symbol: string, lookbackPeriod: string, sampleInterval: string): string =>
  `${symbol}:${lookbackPeriod}:${sampleInterval}`;

/**
 * Short-lived cache in front of the market data source. Entries expire
 * `ttlMs` after they were stored; expired entries are evicted on read.
 */
export class TtlFetchCache implements FetchCache {
  private readonly records = new Map<string, CacheRecord<FetchResult>>();

  constructor(private readonly ttlMs: number) {}

  get(key: string, now: number): FetchResult | undefined {
    const record = this.records.get(key);
    if (!record) return undefined;
    if (now - record.storedAt >= record.ttlMs) {
      this.records.delete(key);
      return undefined;
    }
    return record.value;
  }

  set(key: string, value: FetchResult, now: number): void {
    if (this.ttlMs <= 0) return;
    this.records.set(key, { value, storedAt: now, ttlMs: this.ttlMs });
  }

  get size(): number {
    return this.records.size;
  }
}
