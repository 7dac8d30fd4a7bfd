import { describe, it, expect } from 'vitest';
import { ResultCache, cacheKey } from '../../src/data/result-cache.js';

function clock(start = 1_000_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe('ResultCache', () => {
  it('should return a value right after it is stored', () => {
    const c = clock();
    const cache = new ResultCache<string>({ ttlSeconds: 60, now: c.now });
    cache.put('k', 'v');
    expect(cache.get('k')).toBe('v');
  });

  it('should miss once the TTL has elapsed', () => {
    const c = clock();
    const cache = new ResultCache<string>({ ttlSeconds: 60, now: c.now });
    cache.put('k', 'v');

    c.advance(59_999);
    expect(cache.get('k')).toBe('v');
    c.advance(1);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should restart the TTL when a key is overwritten', () => {
    const c = clock();
    const cache = new ResultCache<number>({ ttlSeconds: 10, now: c.now });
    cache.put('k', 1);
    c.advance(8_000);
    cache.put('k', 2);
    c.advance(8_000);
    expect(cache.get('k')).toBe(2);
  });

  it('should evict the oldest write past maxEntries', () => {
    const cache = new ResultCache<number>({ ttlSeconds: 60, maxEntries: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.put('a', 3);
    cache.put('c', 4);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(3);
    expect(cache.get('c')).toBe(4);
  });

  it('should count hits and misses', () => {
    const cache = new ResultCache<number>({ ttlSeconds: 60 });
    cache.put('a', 1);
    cache.get('a');
    cache.get('b');
    expect(cache.stats).toEqual({ hits: 1, misses: 1, size: 1 });
  });
});

describe('cacheKey', () => {
  it('should lowercase EVM addresses and chains', () => {
    expect(cacheKey('goplus', 'Ethereum', '0xABCDEF0000000000000000000000000000000001'))
      .toBe('goplus:ethereum:0xabcdef0000000000000000000000000000000001');
  });

  it('should keep base58 addresses as they are', () => {
    expect(cacheKey('solana', 'solana', 'So11111111111111111111111111111111111111112'))
      .toBe('solana:solana:So11111111111111111111111111111111111111112');
  });
});
