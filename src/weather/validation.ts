/**
 * Input validators shared by every inbound path.
 * Each one either returns the normalized value or throws ValidationError.
 */

import {
    CITY_NAME_MAX_LENGTH,
    CITY_NAME_MIN_LENGTH,
    MAX_FORECAST_DAYS,
    MAX_TEMPERATURE,
    MIN_TEMPERATURE,
} from './constants.js';
import { ValidationError } from './errors.js';
import { IsoDate } from './types.js';

const CITY_PATTERN = /^[A-Za-z\s\-'.]+$/;

// dd.MM.yyyy; a single-digit day or month is tolerated
const DISPLAY_DATE_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Local calendar date of a timestamp
 */
export function toIsoDate(date: Date): IsoDate {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function addDays(date: IsoDate, days: number): IsoDate {
    const [year, month, day] = date.split('-').map(Number);
    const shifted = new Date(Date.UTC(year, month - 1, day + days));
    return shifted.toISOString().split('T')[0];
}

/**
 * YYYY-MM-DD -> dd.MM.yyyy
 */
export function formatDisplayDate(date: IsoDate): string {
    const [year, month, day] = date.split('-');
    return `${day}.${month}.${year}`;
}

/**
 * Upper-case the first letter of every alphabetic run, lower-case the rest
 */
function titleCase(value: string): string {
    return value
        .toLowerCase()
        .replace(/[a-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1));
}

export function validateCityName(input: unknown): string {
    if (typeof input !== 'string' || input.trim().length === 0) {
        throw new ValidationError('City name must not be empty', { city: 'This field is required' });
    }

    const city = input.trim();

    if (!CITY_PATTERN.test(city)) {
        throw new ValidationError(
            'City name may only contain English letters, spaces, hyphens, apostrophes and dots',
            { city: 'Invalid characters' }
        );
    }

    if (city.length < CITY_NAME_MIN_LENGTH) {
        throw new ValidationError('City name is too short', { city: `Minimum length is ${CITY_NAME_MIN_LENGTH}` });
    }

    if (city.length > CITY_NAME_MAX_LENGTH) {
        throw new ValidationError('City name is too long', { city: `Maximum length is ${CITY_NAME_MAX_LENGTH}` });
    }

    return titleCase(city);
}

function parseDisplayDate(input: unknown): IsoDate {
    const match = typeof input === 'string' ? DISPLAY_DATE_PATTERN.exec(input.trim()) : null;
    if (!match) {
        throw new ValidationError(
            'Invalid date format. Use dd.MM.yyyy (for example: 30.06.2025)',
            { date: 'Expected dd.MM.yyyy' }
        );
    }

    const day = Number(match[1]);
    const month = Number(match[2]);
    const year = Number(match[3]);
    const parsed = new Date(Date.UTC(year, month - 1, day));

    // Date.UTC rolls 31.02 over into March; reject instead
    if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
        throw new ValidationError(`Date ${String(input).trim()} does not exist`, { date: 'Not a calendar date' });
    }

    return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Parse a dd.MM.yyyy string and require today <= date <= today + MAX_FORECAST_DAYS
 */
export function validateForecastDate(input: unknown, now: Date = new Date()): IsoDate {
    const date = parseDisplayDate(input);
    const today = toIsoDate(now);

    if (date < today) {
        throw new ValidationError('Date cannot be in the past', { date: 'Date is in the past' });
    }

    const maxDate = addDays(today, MAX_FORECAST_DAYS);
    if (date > maxDate) {
        throw new ValidationError(
            `Date cannot be more than ${MAX_FORECAST_DAYS} days ahead. Latest allowed date: ${formatDisplayDate(maxDate)}`,
            { date: 'Date is too far ahead' }
        );
    }

    return date;
}

/**
 * Accept a finite number (or numeric string) within the allowed bounds and with at most one decimal
 */
export function validateTemperature(input: unknown, field: string): number {
    const value = typeof input === 'string' && input.trim() !== '' ? Number(input) : input;

    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ValidationError(`${field} must be a number`, { [field]: 'A valid number is required' });
    }

    if (value < MIN_TEMPERATURE || value > MAX_TEMPERATURE) {
        throw new ValidationError(
            `${field} must be between ${MIN_TEMPERATURE.toFixed(1)} and ${MAX_TEMPERATURE.toFixed(1)}`,
            { [field]: 'Out of range' }
        );
    }

    const text = typeof input === 'string' ? input.trim() : String(value);
    const fraction = /\.(\d+)/.exec(text);
    if (fraction && fraction[1].length > 1) {
        throw new ValidationError(
            `${field} must have at most one decimal place`,
            { [field]: 'Ensure that there are no more than 1 decimal places' }
        );
    }

    return value;
}

export function validateTemperatureRange(
    min: number | null | undefined,
    max: number | null | undefined
): [number | null | undefined, number | null | undefined] {
    if (min !== null && min !== undefined && max !== null && max !== undefined && min > max) {
        throw new ValidationError(
            'Minimum temperature cannot be greater than maximum temperature',
            { min_temperature: 'Must not exceed max_temperature' }
        );
    }

    return [min, max];
}
