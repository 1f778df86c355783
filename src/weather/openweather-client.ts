/**
 * OpenWeatherMap API Client
 * Current conditions and the 5-day/3-hour forecast, shaped into the service's result types.
 * Documentation: https://openweathermap.org/api
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { config } from '../config.js';
import { logger } from '../logger.js';
import {
    CityNotFound,
    ProviderAuthError,
    ProviderDataUnavailable,
    ProviderRateLimited,
    ProviderUnavailable,
} from './errors.js';
import { guardProviderCall, RetryPolicy, TransientFailure, withRetry } from './resilience.js';
import {
    CurrentWeather,
    ForecastRange,
    IsoDate,
    isRecord,
    roundTemperature,
    WeatherProvider,
} from './types.js';

interface OWMCurrentResponse {
    main: { temp: number };
    timezone: number; // UTC offset in seconds
}

interface OWMForecastPoint {
    dt: number; // unix seconds
    main: { temp: number };
}

interface OWMForecastResponse {
    list: OWMForecastPoint[];
}

export interface OpenWeatherClientOptions {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    http?: AxiosInstance;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function parseCurrent(data: unknown): OWMCurrentResponse {
    if (isRecord(data) && isRecord(data.main) && typeof data.main.temp === 'number' && typeof data.timezone === 'number') {
        return { main: { temp: data.main.temp }, timezone: data.timezone };
    }
    throw new Error('Malformed current weather payload');
}

function parseForecast(data: unknown): OWMForecastResponse {
    if (!isRecord(data) || !Array.isArray(data.list)) {
        throw new Error('Malformed forecast payload');
    }

    const list: OWMForecastPoint[] = [];
    for (const item of data.list) {
        if (isRecord(item) && typeof item.dt === 'number' && isRecord(item.main) && typeof item.main.temp === 'number') {
            list.push({ dt: item.dt, main: { temp: item.main.temp } });
        }
    }
    return { list };
}

export class OpenWeatherClient implements WeatherProvider {
    private client: AxiosInstance;
    private apiKey: string;
    private retryPolicy: RetryPolicy;
    private now: () => Date;

    constructor(options: Partial<OpenWeatherClientOptions> = {}) {
        this.apiKey = options.apiKey ?? config.openWeatherApiKey;
        this.now = options.now ?? (() => new Date());
        this.retryPolicy = {
            maxRetries: options.maxRetries ?? config.openWeatherMaxRetries,
            baseDelayMs: options.retryDelayMs ?? config.openWeatherRetryDelayMs,
            sleep: options.sleep,
        };
        this.client = options.http ?? axios.create({
            baseURL: options.baseUrl ?? config.openWeatherBaseUrl,
            timeout: options.timeoutMs ?? config.openWeatherTimeoutMs,
        });

        if (!this.isConfigured()) {
            logger.warn('[OpenWeather] API key not configured');
        }
    }

    /**
     * Check if the client is configured with an API key
     */
    isConfigured(): boolean {
        return this.apiKey.length > 0;
    }

    async getCurrentWeather(city: string): Promise<CurrentWeather> {
        return guardProviderCall(`getCurrentWeather(${city})`, async () => {
            const data = parseCurrent(await this.request('/weather', city));

            const temperature = roundTemperature(data.main.temp);
            const local = new Date(this.now().getTime() + data.timezone * 1000);
            const localTime = local.toISOString().slice(11, 16);

            logger.info(`[OpenWeather] Current weather for ${city}: ${temperature}°C at ${localTime}`);
            return { temperature, localTime };
        });
    }

    /**
     * Min/max over the 3-hour points that fall on the given UTC calendar date
     */
    async getForecast(city: string, date: IsoDate): Promise<ForecastRange> {
        return guardProviderCall(`getForecast(${city}, ${date})`, async () => {
            const data = parseForecast(await this.request('/forecast', city));

            const temps = data.list
                .filter(item => new Date(item.dt * 1000).toISOString().split('T')[0] === date)
                .map(item => item.main.temp);

            if (temps.length === 0) {
                throw new ProviderDataUnavailable(
                    `Forecast for ${date} is not available. Forecasts only cover the next 5 days.`
                );
            }

            const result = {
                minTemperature: roundTemperature(Math.min(...temps)),
                maxTemperature: roundTemperature(Math.max(...temps)),
            };
            logger.info(`[OpenWeather] Forecast for ${city} on ${date}: ${result.minTemperature}°C - ${result.maxTemperature}°C`);
            return result;
        });
    }

    private async request(path: string, city: string): Promise<unknown> {
        return withRetry(`GET ${path} ${city}`, async () => {
            let response: AxiosResponse<unknown>;
            try {
                response = await this.client.get<unknown>(path, {
                    params: { q: city, units: 'metric', lang: 'en', appid: this.apiKey },
                    validateStatus: () => true,
                });
            } catch (error) {
                if (axios.isAxiosError(error) && !error.response) {
                    const kind = error.code && TIMEOUT_CODES.has(error.code) ? 'timeout' : 'connection';
                    throw new TransientFailure(kind, error.message, { cause: error });
                }
                throw error;
            }

            return this.checkStatus(response);
        }, this.retryPolicy);
    }

    private checkStatus(response: AxiosResponse<unknown>): unknown {
        const { status } = response;

        if (status >= 200 && status < 300) return response.data;
        if (status === 404) throw new CityNotFound('City not found by the weather service');
        if (status === 401) throw new ProviderAuthError('Invalid OpenWeatherMap API key');
        if (status === 429) throw new ProviderRateLimited('OpenWeatherMap request limit exceeded');
        if (status >= 500) throw new TransientFailure('server', `Weather service answered HTTP ${status}`);

        throw new ProviderUnavailable(`Weather service rejected the request with HTTP ${status}`);
    }
}
