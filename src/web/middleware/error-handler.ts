/**
 * Error Handler Middleware
 * Renders every failure as { error, timestamp, request_id?, details? }
 */

import { Request, Response, NextFunction } from 'express';
import { describeError, logger } from '../../logger.js';
import { ValidationError, WeatherApiError } from '../../weather/errors.js';
import { getRequestId } from './request-logger.js';

export interface ErrorBody {
    error: string;
    timestamp: string;
    request_id?: string;
    details?: Record<string, string>;
}

export function buildErrorBody(message: string, requestId?: string, details?: Record<string, string>): ErrorBody {
    const body: ErrorBody = { error: message, timestamp: new Date().toISOString() };
    if (details) body.details = details;
    if (requestId) body.request_id = requestId;
    return body;
}

// body-parser marks unparseable JSON this way
function isBodyParseError(err: unknown): boolean {
    return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json(buildErrorBody('Resource not found', getRequestId(res)));
}

// Express recognises error handlers by their four parameters
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
    const requestId = getRequestId(res);
    const tag = `[${requestId ?? 'unknown'}]`;

    if (err instanceof WeatherApiError) {
        if (err.statusCode >= 500) {
            logger.error(`${tag} ${err.name}: ${err.message}`, { path: req.path });
        } else {
            logger.warn(`${tag} ${err.name}: ${err.message}`, { path: req.path });
        }

        const details = err instanceof ValidationError ? err.details : undefined;
        res.status(err.statusCode).json(buildErrorBody(err.message, requestId, details));
        return;
    }

    if (isBodyParseError(err)) {
        logger.warn(`${tag} Malformed JSON body`, { path: req.path });
        res.status(400).json(buildErrorBody('Malformed JSON body', requestId));
        return;
    }

    logger.error(`${tag} Unhandled exception: ${describeError(err)}`, {
        path: req.path,
        stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json(buildErrorBody('Internal server error', requestId));
}
