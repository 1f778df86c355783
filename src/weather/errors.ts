/**
 * Error taxonomy for the weather service.
 * Every error carries the HTTP status the web layer answers with.
 */

export interface WeatherErrorOptions {
    cause?: unknown;
}

export class WeatherApiError extends Error {
    readonly statusCode: number;

    constructor(message: string, statusCode: number, options?: WeatherErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.statusCode = statusCode;
    }
}

/**
 * Bad input. Never retried.
 */
export class ValidationError extends WeatherApiError {
    readonly details?: Record<string, string>;

    constructor(message: string, details?: Record<string, string>) {
        super(message, 400);
        this.details = details;
    }
}

export class CityNotFound extends WeatherApiError {
    constructor(message = 'City not found. Check the spelling of the city name', options?: WeatherErrorOptions) {
        super(message, 404, options);
    }
}

/**
 * Base for failures of the upstream weather service (503)
 */
export class ProviderError extends WeatherApiError {
    constructor(message: string, options?: WeatherErrorOptions) {
        super(message, 503, options);
    }
}

export class ProviderAuthError extends ProviderError {}

export class ProviderRateLimited extends ProviderError {}

export class ProviderUnavailable extends ProviderError {}

/**
 * The provider answered but had no data points for the requested date
 */
export class ProviderDataUnavailable extends ProviderError {}

/**
 * Store-level race on the (city, date) key that the atomic upsert could not resolve
 */
export class ConflictError extends WeatherApiError {
    constructor(message: string, options?: WeatherErrorOptions) {
        super(message, 409, options);
    }
}
