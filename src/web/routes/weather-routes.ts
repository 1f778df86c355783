/**
 * Weather routes
 * Thin adapters from HTTP to the ForecastResolver; payloads use snake_case field names.
 */

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { ForecastResolver } from '../../weather/forecast-resolver.js';
import { ValidationError } from '../../weather/errors.js';
import { CurrentWeather, ForecastRange, isRecord } from '../../weather/types.js';

function requireFields(source: Record<string, unknown>, fields: string[]): void {
    const missing = fields.filter(field => source[field] === undefined || source[field] === null || source[field] === '');
    if (missing.length > 0) {
        const details: Record<string, string> = {};
        for (const field of missing) details[field] = 'This field is required';
        throw new ValidationError('Parameter validation error', details);
    }
}

function shapeCurrent(result: CurrentWeather) {
    return { temperature: result.temperature, local_time: result.localTime };
}

function shapeForecast(result: ForecastRange) {
    return { min_temperature: result.minTemperature, max_temperature: result.maxTemperature };
}

// Express 4 does not catch rejected handler promises on its own
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}

export function createWeatherRouter(resolver: ForecastResolver): Router {
    const router = Router();

    // GET /api/weather/current?city=
    router.get('/current', asyncHandler(async (req, res) => {
        requireFields(req.query, ['city']);
        const result = await resolver.getCurrentWeather(req.query.city);
        res.json(shapeCurrent(result));
    }));

    // GET /api/weather/forecast?city=&date=dd.MM.yyyy
    router.get('/forecast', asyncHandler(async (req, res) => {
        requireFields(req.query, ['city', 'date']);
        const result = await resolver.getForecast(req.query.city, req.query.date);
        res.json(shapeForecast(result));
    }));

    // POST /api/weather/forecast - create or replace a custom forecast
    router.post('/forecast', asyncHandler(async (req, res) => {
        const body: unknown = req.body;
        if (!isRecord(body)) {
            throw new ValidationError('Request body must be a JSON object');
        }
        requireFields(body, ['city', 'date', 'min_temperature', 'max_temperature']);

        const { forecast, created } = await resolver.upsertOverride({
            city: body.city,
            date: body.date,
            minTemperature: body.min_temperature,
            maxTemperature: body.max_temperature,
        });
        res.status(created ? 201 : 200).json(shapeForecast(forecast));
    }));

    return router;
}
