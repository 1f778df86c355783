import { CustomForecast, IsoDate, OverrideInput, UpsertResult } from '../weather/types.js';

/**
 * Persistence for custom forecasts, one record per (city, date).
 * City matching is case-insensitive. upsert must be atomic per key: concurrent
 * writers end in a single row holding the last writer's values.
 */
export interface OverrideStore {
    get(city: string, date: IsoDate): Promise<CustomForecast | null>;
    upsert(input: OverrideInput): Promise<UpsertResult>;
    close(): Promise<void>;
}

export function overrideKey(city: string, date: IsoDate): string {
    return `${city.toLowerCase()}|${date}`;
}

/**
 * Map-backed store used when no database is configured
 */
export class InMemoryOverrideStore implements OverrideStore {
    private records: Map<string, CustomForecast> = new Map();

    async get(city: string, date: IsoDate): Promise<CustomForecast | null> {
        const record = this.records.get(overrideKey(city, date));
        return record ? { ...record } : null;
    }

    async upsert(input: OverrideInput): Promise<UpsertResult> {
        const key = overrideKey(input.city, input.date);
        const existing = this.records.get(key);
        const now = new Date();

        const forecast: CustomForecast = {
            city: input.city,
            date: input.date,
            minTemperature: input.minTemperature,
            maxTemperature: input.maxTemperature,
            createdAt: existing?.createdAt ?? now,
            updatedAt: now,
        };
        this.records.set(key, forecast);

        return { forecast: { ...forecast }, created: !existing };
    }

    get size(): number {
        return this.records.size;
    }

    async close(): Promise<void> {
        this.records.clear();
    }
}
