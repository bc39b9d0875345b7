import { FetchResult } from './data.types';
import { fetchCacheKey, TtlFetchCache } from './fetch-cache';

const result: FetchResult = { status: 'data-unavailable', reason: 'No data for AAPL (5d@1m)' };

describe('TtlFetchCache', () => {
  it('returns a stored result until the TTL elapses', () => {
    const cache = new TtlFetchCache(900);
    cache.set('AAPL:1d:1m', result, 1_000);

    expect(cache.get('AAPL:1d:1m', 1_899)).toBe(result);
    expect(cache.get('AAPL:1d:1m', 1_900)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('keys entries by symbol, period and interval', () => {
    const cache = new TtlFetchCache(900);
    cache.set(fetchCacheKey('AAPL', '1d', '1m'), result, 0);

    expect(cache.get(fetchCacheKey('MSFT', '1d', '1m'), 10)).toBeUndefined();
    expect(cache.get(fetchCacheKey('AAPL', '1d', '5m'), 10)).toBeUndefined();
    expect(cache.get('AAPL:1d:1m', 10)).toBe(result);
  });

  it('stores nothing with a zero TTL', () => {
    const cache = new TtlFetchCache(0);
    cache.set('AAPL:1d:1m', result, 0);
    expect(cache.size).toBe(0);
  });
});
