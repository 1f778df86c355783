import dotenv from 'dotenv';

dotenv.config();

export interface Config {
    // HTTP
    port: number;
    throttlePerHour: number;

    // OpenWeatherMap
    openWeatherApiKey: string;
    openWeatherBaseUrl: string;
    openWeatherTimeoutMs: number;
    openWeatherMaxRetries: number;
    openWeatherRetryDelayMs: number;

    // Cache
    cacheTtlCurrentSeconds: number;   // TTL for current weather entries (default: 300)
    cacheTtlForecastSeconds: number;  // TTL for forecast entries (default: 3600)
    cacheMaxEntries: number;

    // Storage - in-memory overrides when unset
    databaseUrl: string | undefined;

    // Logging
    logLevel: string;
    logToFile: boolean;
    nodeEnv: string;
}

function getEnvVarOptional(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

function getEnvVarBool(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true';
}

export function getEnvVarNumber(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

export const config: Config = {
    port: getEnvVarNumber('PORT', 8000),
    throttlePerHour: getEnvVarNumber('THROTTLE_PER_HOUR', 100),

    openWeatherApiKey: getEnvVarOptional('OPENWEATHER_API_KEY', ''),
    openWeatherBaseUrl: getEnvVarOptional('OPENWEATHER_BASE_URL', 'https://api.openweathermap.org/data/2.5'),
    openWeatherTimeoutMs: getEnvVarNumber('OPENWEATHER_TIMEOUT_MS', 10000),
    openWeatherMaxRetries: getEnvVarNumber('OPENWEATHER_MAX_RETRIES', 3),
    openWeatherRetryDelayMs: getEnvVarNumber('OPENWEATHER_RETRY_DELAY_MS', 1000),

    cacheTtlCurrentSeconds: getEnvVarNumber('CACHE_TTL_CURRENT_SECONDS', 300),
    cacheTtlForecastSeconds: getEnvVarNumber('CACHE_TTL_FORECAST_SECONDS', 3600),
    cacheMaxEntries: getEnvVarNumber('CACHE_MAX_ENTRIES', 1000),

    databaseUrl: process.env.DATABASE_URL || undefined,

    logLevel: getEnvVarOptional('LOG_LEVEL', 'info'),
    logToFile: getEnvVarBool('LOG_TO_FILE', true),
    nodeEnv: getEnvVarOptional('NODE_ENV', 'development'),
};
