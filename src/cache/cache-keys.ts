import { IsoDate } from '../weather/types.js';

export type CacheEndpoint = 'current' | 'forecast';

/**
 * weather_{current|forecast}_{city}[_{date}]
 * The endpoint segment keeps current and forecast entries for a city apart.
 */
export function buildCacheKey(endpoint: 'current', city: string): string;
export function buildCacheKey(endpoint: 'forecast', city: string, date: IsoDate): string;
export function buildCacheKey(endpoint: CacheEndpoint, city: string, date?: IsoDate): string {
    const base = `weather_${endpoint}_${city.toLowerCase()}`;
    return date ? `${base}_${date}` : base;
}
