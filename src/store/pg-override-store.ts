/**
 * PostgreSQL-backed override store.
 * Uniqueness of (lower(city), date) is enforced by the table constraint and
 * upserts go through INSERT ... ON CONFLICT, so no application locking is needed.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { logger } from '../logger.js';
import { ConflictError } from '../weather/errors.js';
import { CustomForecast, IsoDate, isRecord, OverrideInput, UpsertResult } from '../weather/types.js';
import { OverrideStore } from './override-store.js';

const SCHEMA_PATH = path.join(process.cwd(), 'sql', 'custom_forecasts.sql');

const UNIQUE_VIOLATION = '23505';

const RETURNING = `
    RETURNING city,
              to_char(date, 'YYYY-MM-DD') AS date,
              min_temperature,
              max_temperature,
              created_at,
              updated_at,
              (xmax = 0) AS inserted
`;

const SELECT_SQL = `
    SELECT city,
           to_char(date, 'YYYY-MM-DD') AS date,
           min_temperature,
           max_temperature,
           created_at,
           updated_at
    FROM custom_forecasts
    WHERE city_key = lower($1) AND date = $2::date
`;

const UPSERT_SQL = `
    INSERT INTO custom_forecasts (city, city_key, date, min_temperature, max_temperature)
    VALUES ($1, lower($1), $2::date, $3, $4)
    ON CONFLICT (city_key, date) DO UPDATE
    SET city = EXCLUDED.city,
        min_temperature = EXCLUDED.min_temperature,
        max_temperature = EXCLUDED.max_temperature,
        updated_at = now()
    ${RETURNING}
`;

/**
 * The slice of pg.Pool this store talks to
 */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
    end(): Promise<void>;
}

function buildSslOption(url: string) {
    try {
        const parsed = new URL(url);
        const host = parsed.hostname.toLowerCase();
        if (!host || host === 'localhost' || host === '127.0.0.1') {
            return false;
        }
        if (parsed.searchParams.get('sslmode') === 'disable') {
            return false;
        }
    } catch (err) {
        logger.warn('[PgOverrideStore] Could not parse DATABASE_URL, enabling SSL', { error: String(err) });
    }
    return { rejectUnauthorized: false } as const;
}

// NUMERIC columns arrive as strings
function toNumber(value: unknown): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed)) throw new Error(`Expected a numeric column, got ${String(value)}`);
    return parsed;
}

function toDate(value: unknown): Date {
    if (value instanceof Date) return value;
    if (typeof value === 'string') return new Date(value);
    throw new Error(`Expected a timestamp column, got ${String(value)}`);
}

function toForecast(row: unknown): CustomForecast {
    if (!isRecord(row) || typeof row.city !== 'string' || typeof row.date !== 'string') {
        throw new Error('Unexpected custom_forecasts row shape');
    }
    return {
        city: row.city,
        date: row.date,
        minTemperature: toNumber(row.min_temperature),
        maxTemperature: toNumber(row.max_temperature),
        createdAt: toDate(row.created_at),
        updatedAt: toDate(row.updated_at),
    };
}

function isUniqueViolation(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

export class PgOverrideStore implements OverrideStore {
    constructor(private readonly db: Queryable) { }

    static fromUrl(databaseUrl: string): PgOverrideStore {
        const pool = new Pool({
            connectionString: databaseUrl,
            max: 10,
            ssl: buildSslOption(databaseUrl),
        });
        pool.on('error', err => {
            logger.error('[PgOverrideStore] Idle client error', { error: err.message });
        });
        return new PgOverrideStore({
            query: (text, values) => pool.query(text, values),
            end: () => pool.end(),
        });
    }

    /**
     * Create the table and its constraints if they are missing
     */
    async ensureSchema(): Promise<void> {
        const sql = fs.readFileSync(SCHEMA_PATH, 'utf8').trim();
        await this.db.query(sql);
        logger.info('[PgOverrideStore] Schema ready');
    }

    async get(city: string, date: IsoDate): Promise<CustomForecast | null> {
        const { rows } = await this.db.query(SELECT_SQL, [city, date]);
        return rows.length > 0 ? toForecast(rows[0]) : null;
    }

    async upsert(input: OverrideInput): Promise<UpsertResult> {
        let rows: unknown[];
        try {
            ({ rows } = await this.db.query(UPSERT_SQL, [
                input.city,
                input.date,
                input.minTemperature,
                input.maxTemperature,
            ]));
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new ConflictError(`Concurrent write for ${input.city} on ${input.date}`, { cause: error });
            }
            throw error;
        }

        const row = rows[0];
        if (row === undefined) {
            throw new Error(`Upsert for ${input.city} on ${input.date} returned no row`);
        }
        return {
            forecast: toForecast(row),
            created: isRecord(row) && row.inserted === true,
        };
    }

    async close(): Promise<void> {
        await this.db.end();
    }
}
