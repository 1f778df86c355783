export const API_NAME = 'Weather API';
export const API_VERSION = '1.0.0';

export const MIN_TEMPERATURE = -100.0;
export const MAX_TEMPERATURE = 100.0;

export const MAX_FORECAST_DAYS = 10;

export const CITY_NAME_MIN_LENGTH = 2;
export const CITY_NAME_MAX_LENGTH = 100;

export const ENDPOINTS_INFO = {
    current_weather: {
        url: '/api/weather/current',
        method: 'GET',
        description: 'Get current weather',
        parameters: ['city'],
    },
    forecast: {
        url: '/api/weather/forecast',
        method: 'GET',
        description: 'Get weather forecast',
        parameters: ['city', 'date'],
    },
    custom_forecast: {
        url: '/api/weather/forecast',
        method: 'POST',
        description: 'Create or replace a custom forecast',
        body: ['city', 'date', 'min_temperature', 'max_temperature'],
    },
} as const;
