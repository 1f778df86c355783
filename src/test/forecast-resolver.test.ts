/**
 * ForecastResolver Test Suite
 * Real cache and in-memory store, mocked provider.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { MemoryCache } from '../cache/memory-cache.js';
import { InMemoryOverrideStore } from '../store/override-store.js';
import { ForecastResolver } from '../weather/forecast-resolver.js';
import { ConflictError, ProviderUnavailable, ValidationError } from '../weather/errors.js';
import { CurrentWeather, ForecastRange, OverrideInput, UpsertResult, WeatherPayload, WeatherProvider } from '../weather/types.js';

// Mock the logger to avoid console noise during tests
jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
    describeError: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

// 15 June 2025, midday local time
const clock = () => new Date(2025, 5, 15, 12, 0, 0);

describe('ForecastResolver', () => {
    let getCurrentWeather: jest.Mock<WeatherProvider['getCurrentWeather']>;
    let getForecast: jest.Mock<WeatherProvider['getForecast']>;
    let store: InMemoryOverrideStore;
    let cache: MemoryCache<WeatherPayload>;
    let resolver: ForecastResolver;

    beforeEach(() => {
        getCurrentWeather = jest.fn<WeatherProvider['getCurrentWeather']>();
        getForecast = jest.fn<WeatherProvider['getForecast']>();
        store = new InMemoryOverrideStore();
        cache = new MemoryCache<WeatherPayload>();
        resolver = new ForecastResolver({
            provider: { getCurrentWeather, getForecast },
            store,
            cache,
            clock,
        });
    });

    describe('getForecast', () => {
        it('should prefer a stored override over the provider', async () => {
            await resolver.upsertOverride({ city: 'moscow ', date: '16.06.2025', minTemperature: -5, maxTemperature: 10 });

            await expect(resolver.getForecast('MOSCOW', '16.06.2025')).resolves.toEqual({
                minTemperature: -5,
                maxTemperature: 10,
            });
            expect(getForecast).not.toHaveBeenCalled();
        });

        it('should ask the provider with the normalized city and ISO date', async () => {
            getForecast.mockResolvedValue({ minTemperature: 12.3, maxTemperature: 18.8 });

            await expect(resolver.getForecast('  paris', '20.06.2025')).resolves.toEqual({
                minTemperature: 12.3,
                maxTemperature: 18.8,
            });
            expect(getForecast).toHaveBeenCalledWith('Paris', '2025-06-20');
        });

        it('should serve a repeated request from the cache', async () => {
            getForecast.mockResolvedValue({ minTemperature: 1, maxTemperature: 2 });

            const first = await resolver.getForecast('Paris', '20.06.2025');
            const second = await resolver.getForecast('paris', '20.06.2025');

            expect(second).toEqual(first);
            expect(getForecast).toHaveBeenCalledTimes(1);
        });

        it('should let an override written later win over a cached provider value', async () => {
            getForecast.mockResolvedValue({ minTemperature: 1, maxTemperature: 2 });
            await resolver.getForecast('Paris', '20.06.2025');

            await resolver.upsertOverride({ city: 'Paris', date: '20.06.2025', minTemperature: 30, maxTemperature: 35 });

            await expect(resolver.getForecast('Paris', '20.06.2025')).resolves.toEqual({
                minTemperature: 30,
                maxTemperature: 35,
            });
            expect(getForecast).toHaveBeenCalledTimes(1);
        });

        it('should not cache provider failures', async () => {
            getForecast
                .mockRejectedValueOnce(new ProviderUnavailable('The weather service is temporarily unavailable'))
                .mockResolvedValueOnce({ minTemperature: 4, maxTemperature: 9 });

            await expect(resolver.getForecast('Paris', '20.06.2025')).rejects.toBeInstanceOf(ProviderUnavailable);
            await expect(resolver.getForecast('Paris', '20.06.2025')).resolves.toEqual({
                minTemperature: 4,
                maxTemperature: 9,
            });
            expect(getForecast).toHaveBeenCalledTimes(2);
        });

        it('should reject dates outside the window before touching store or provider', async () => {
            const get = jest.spyOn(store, 'get');

            await expect(resolver.getForecast('Paris', '30.06.2025')).rejects.toBeInstanceOf(ValidationError);
            await expect(resolver.getForecast('Paris', '14.06.2025')).rejects.toThrow('Date cannot be in the past');

            expect(get).not.toHaveBeenCalled();
            expect(getForecast).not.toHaveBeenCalled();
        });

        it('should reject invalid cities', async () => {
            await expect(resolver.getForecast('Paris1', '20.06.2025')).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('getCurrentWeather', () => {
        it('should fetch once and then serve from the cache', async () => {
            const now: CurrentWeather = { temperature: 15.5, localTime: '15:00' };
            getCurrentWeather.mockResolvedValue(now);

            await expect(resolver.getCurrentWeather('moscow')).resolves.toEqual(now);
            await expect(resolver.getCurrentWeather('Moscow')).resolves.toEqual(now);

            expect(getCurrentWeather).toHaveBeenCalledTimes(1);
            expect(getCurrentWeather).toHaveBeenCalledWith('Moscow');
        });

        it('should never consult the override store', async () => {
            const get = jest.spyOn(store, 'get');
            getCurrentWeather.mockResolvedValue({ temperature: 3, localTime: '08:00' });

            await resolver.getCurrentWeather('Oslo');

            expect(get).not.toHaveBeenCalled();
        });

        it('should keep current weather and forecasts under separate keys', async () => {
            getCurrentWeather.mockResolvedValue({ temperature: 3, localTime: '08:00' });
            getForecast.mockResolvedValue({ minTemperature: -1, maxTemperature: 5 });

            await resolver.getCurrentWeather('Oslo');
            await expect(resolver.getForecast('Oslo', '15.06.2025')).resolves.toEqual({
                minTemperature: -1,
                maxTemperature: 5,
            });
            expect(cache.size).toBe(2);
        });
    });

    describe('upsertOverride', () => {
        it('should reject temperatures with more than one decimal without writing', async () => {
            await expect(
                resolver.upsertOverride({ city: 'Berlin', date: '18.06.2025', minTemperature: 10.04, maxTemperature: 20 })
            ).rejects.toThrow('min_temperature must have at most one decimal place');
            expect(store.size).toBe(0);
        });

        it('should create once and replace afterwards', async () => {
            const first = await resolver.upsertOverride({
                city: 'berlin', date: '18.06.2025', minTemperature: '10.5', maxTemperature: 20,
            });
            const second = await resolver.upsertOverride({
                city: 'Berlin', date: '18.06.2025', minTemperature: 11, maxTemperature: 21,
            });

            expect(first.created).toBe(true);
            expect(first.forecast).toMatchObject({ city: 'Berlin', date: '2025-06-18', minTemperature: 10.5, maxTemperature: 20 });
            expect(second.created).toBe(false);
            expect(store.size).toBe(1);
        });

        it('should reject min above max without writing', async () => {
            await expect(
                resolver.upsertOverride({ city: 'Berlin', date: '18.06.2025', minTemperature: 5, maxTemperature: 1 })
            ).rejects.toThrow('Minimum temperature cannot be greater than maximum temperature');
            expect(store.size).toBe(0);
        });

        it('should reject out-of-range temperatures', async () => {
            await expect(
                resolver.upsertOverride({ city: 'Berlin', date: '18.06.2025', minTemperature: -101, maxTemperature: 1 })
            ).rejects.toThrow('min_temperature must be between -100.0 and 100.0');
        });

        it('should retry a conflicting write once', async () => {
            const upsert = jest.spyOn(store, 'upsert')
                .mockRejectedValueOnce(new ConflictError('Concurrent write for Berlin on 2025-06-18'));

            const result = await resolver.upsertOverride({
                city: 'Berlin', date: '18.06.2025', minTemperature: 1, maxTemperature: 2,
            });

            expect(result.created).toBe(true);
            expect(upsert).toHaveBeenCalledTimes(2);
        });

        it('should surface a second conflict', async () => {
            const conflict = new ConflictError('Concurrent write for Berlin on 2025-06-18');
            jest.spyOn(store, 'upsert').mockImplementation(
                (_input: OverrideInput): Promise<UpsertResult> => Promise.reject(conflict)
            );

            await expect(
                resolver.upsertOverride({ city: 'Berlin', date: '18.06.2025', minTemperature: 1, maxTemperature: 2 })
            ).rejects.toBe(conflict);
        });

        it('should leave the cache untouched', async () => {
            await resolver.upsertOverride({ city: 'Berlin', date: '18.06.2025', minTemperature: 1, maxTemperature: 2 });
            expect(cache.size).toBe(0);
        });
    });

    it('should honour custom cache TTLs', async () => {
        let nowMs = 0;
        const shortCache = new MemoryCache<WeatherPayload>({ now: () => nowMs });
        const shortLived = new ForecastResolver({
            provider: { getCurrentWeather, getForecast },
            store,
            cache: shortCache,
            ttl: { forecastSeconds: 60 },
            clock,
        });
        const range: ForecastRange = { minTemperature: 0, maxTemperature: 1 };
        getForecast.mockResolvedValue(range);

        await shortLived.getForecast('Rome', '16.06.2025');
        nowMs += 60_000;
        await shortLived.getForecast('Rome', '16.06.2025');

        expect(getForecast).toHaveBeenCalledTimes(2);
    });
});
