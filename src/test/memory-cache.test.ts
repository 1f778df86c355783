import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryCache } from '../cache/memory-cache.js';
import { buildCacheKey } from '../cache/cache-keys.js';

describe('MemoryCache', () => {
    let clock: number;
    let cache: MemoryCache<number>;

    beforeEach(() => {
        clock = 1_000_000;
        cache = new MemoryCache<number>({ maxEntries: 3, now: () => clock });
    });

    it('should return stored values until the TTL elapses', async () => {
        await cache.set('a', 1, 300);

        clock += 299_999;
        await expect(cache.get('a')).resolves.toBe(1);

        clock += 1;
        await expect(cache.get('a')).resolves.toBeUndefined();
        expect(cache.size).toBe(0);
    });

    it('should miss on unknown keys', async () => {
        await expect(cache.get('missing')).resolves.toBeUndefined();
    });

    it('should overwrite and restart the TTL on set', async () => {
        await cache.set('a', 1, 10);
        clock += 9_000;
        await cache.set('a', 2, 10);
        clock += 9_000;

        await expect(cache.get('a')).resolves.toBe(2);
    });

    it('should evict the oldest entries past maxEntries', async () => {
        await cache.set('a', 1, 60);
        await cache.set('b', 2, 60);
        await cache.set('c', 3, 60);
        await cache.set('d', 4, 60);

        expect(cache.size).toBe(3);
        await expect(cache.get('a')).resolves.toBeUndefined();
        await expect(cache.get('d')).resolves.toBe(4);
    });

    it('should drop expired entries before live ones when over capacity', async () => {
        await cache.set('short', 1, 1);
        await cache.set('b', 2, 60);
        await cache.set('c', 3, 60);
        clock += 2_000;
        await cache.set('d', 4, 60);

        expect(cache.size).toBe(3);
        await expect(cache.get('b')).resolves.toBe(2);
    });
});

describe('buildCacheKey', () => {
    it('should build distinct keys per endpoint kind', () => {
        expect(buildCacheKey('current', 'Moscow')).toBe('weather_current_moscow');
        expect(buildCacheKey('forecast', 'Moscow', '2025-06-16')).toBe('weather_forecast_moscow_2025-06-16');
    });

    it('should lower-case the city', () => {
        expect(buildCacheKey('forecast', 'New York', '2025-06-16')).toBe('weather_forecast_new york_2025-06-16');
    });
});
