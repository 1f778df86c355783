/**
 * Forecast Resolver
 * Decides, per request, between a stored override and the provider (read through the cache).
 *
 * Forecasts: override -> cache -> provider. Current weather: cache -> provider.
 * Overrides are never cached, and writing one leaves the cache alone: the next
 * forecast read finds the override first, so a stale provider entry is never served.
 */

import { CacheLayer } from '../cache/memory-cache.js';
import { buildCacheKey } from '../cache/cache-keys.js';
import { logger } from '../logger.js';
import { OverrideStore } from '../store/override-store.js';
import { ConflictError } from './errors.js';
import {
    CurrentWeather,
    ForecastRange,
    isCurrentWeather,
    isForecastRange,
    UpsertResult,
    WeatherPayload,
    WeatherProvider,
} from './types.js';
import {
    validateCityName,
    validateForecastDate,
    validateTemperature,
    validateTemperatureRange,
} from './validation.js';

export interface CacheTtl {
    currentSeconds: number;
    forecastSeconds: number;
}

export interface ForecastResolverDeps {
    provider: WeatherProvider;
    store: OverrideStore;
    cache: CacheLayer<WeatherPayload>;
    ttl?: Partial<CacheTtl>;
    clock?: () => Date; // decides "today" for date validation
}

/**
 * Raw override request as it arrives from the web layer
 */
export interface OverrideRequest {
    city: unknown;
    date: unknown;
    minTemperature: unknown;
    maxTemperature: unknown;
}

const DEFAULT_TTL: CacheTtl = {
    currentSeconds: 300,
    forecastSeconds: 3600,
};

export class ForecastResolver {
    private readonly provider: WeatherProvider;
    private readonly store: OverrideStore;
    private readonly cache: CacheLayer<WeatherPayload>;
    private readonly ttl: CacheTtl;
    private readonly clock: () => Date;

    constructor(deps: ForecastResolverDeps) {
        this.provider = deps.provider;
        this.store = deps.store;
        this.cache = deps.cache;
        this.ttl = { ...DEFAULT_TTL, ...deps.ttl };
        this.clock = deps.clock ?? (() => new Date());
    }

    async getCurrentWeather(cityInput: unknown): Promise<CurrentWeather> {
        const city = validateCityName(cityInput);
        const key = buildCacheKey('current', city);

        const cached = await this.cache.get(key);
        if (cached && isCurrentWeather(cached)) {
            logger.debug(`[ForecastResolver] Cache hit ${key}`);
            return cached;
        }

        const result = await this.provider.getCurrentWeather(city);
        await this.cache.set(key, result, this.ttl.currentSeconds);
        return result;
    }

    async getForecast(cityInput: unknown, dateInput: unknown): Promise<ForecastRange> {
        const city = validateCityName(cityInput);
        const date = validateForecastDate(dateInput, this.clock());

        const override = await this.store.get(city, date);
        if (override) {
            logger.info(`[ForecastResolver] Using custom forecast for ${city} on ${date}`);
            return {
                minTemperature: override.minTemperature,
                maxTemperature: override.maxTemperature,
            };
        }

        const key = buildCacheKey('forecast', city, date);
        const cached = await this.cache.get(key);
        if (cached && isForecastRange(cached)) {
            logger.debug(`[ForecastResolver] Cache hit ${key}`);
            return cached;
        }

        logger.info(`[ForecastResolver] No custom forecast for ${city} on ${date}, asking the provider`);
        const result = await this.provider.getForecast(city, date);
        await this.cache.set(key, result, this.ttl.forecastSeconds);
        return result;
    }

    /**
     * Create or replace the override for (city, date). A ConflictError from the
     * store is retried once before it is surfaced.
     */
    async upsertOverride(request: OverrideRequest): Promise<UpsertResult> {
        const city = validateCityName(request.city);
        const date = validateForecastDate(request.date, this.clock());
        const minTemperature = validateTemperature(request.minTemperature, 'min_temperature');
        const maxTemperature = validateTemperature(request.maxTemperature, 'max_temperature');
        validateTemperatureRange(minTemperature, maxTemperature);

        const input = { city, date, minTemperature, maxTemperature };

        let result: UpsertResult;
        try {
            result = await this.store.upsert(input);
        } catch (error) {
            if (!(error instanceof ConflictError)) throw error;
            logger.warn(`[ForecastResolver] Upsert conflict for ${city} on ${date}, retrying once`);
            result = await this.store.upsert(input);
        }

        logger.info(`[ForecastResolver] Custom forecast ${result.created ? 'created' : 'updated'} for ${city} on ${date}`);
        return result;
    }
}
