/**
 * Weather data types shared by the provider client, resolver and web layer
 */

/**
 * Calendar date as YYYY-MM-DD
 */
export type IsoDate = string;

export interface CurrentWeather {
    temperature: number; // °C, one decimal
    localTime: string;   // HH:MM in the city's local time
}

export interface ForecastRange {
    minTemperature: number; // °C, one decimal
    maxTemperature: number; // °C, one decimal
}

export type WeatherPayload = CurrentWeather | ForecastRange;

/**
 * Source of weather data the resolver falls back to when no override exists
 */
export interface WeatherProvider {
    getCurrentWeather(city: string): Promise<CurrentWeather>;
    getForecast(city: string, date: IsoDate): Promise<ForecastRange>;
}

/**
 * Stored override for a (city, date) pair
 */
export interface CustomForecast extends ForecastRange {
    city: string;
    date: IsoDate;
    createdAt: Date;
    updatedAt: Date;
}

export interface OverrideInput {
    city: string;
    date: IsoDate;
    minTemperature: number;
    maxTemperature: number;
}

export interface UpsertResult {
    forecast: CustomForecast;
    created: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isCurrentWeather(value: WeatherPayload): value is CurrentWeather {
    return 'temperature' in value && 'localTime' in value;
}

export function isForecastRange(value: WeatherPayload): value is ForecastRange {
    return 'minTemperature' in value && 'maxTemperature' in value;
}

/**
 * Round to one decimal place from the exact binary value, ties to even.
 * toFixed already rounds the exact value; it only differs on true ties
 * (x.25, x.75), where it rounds away from zero.
 */
export function roundTemperature(value: number): number {
    const isTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
    if (!isTie) {
        return Number(value.toFixed(1));
    }

    const lower = Math.floor(value * 10);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return tenths / 10;
}
