/**
 * Request Logger Middleware
 * Tags each request with a short id and logs entry and completion with timing
 */

import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { logger } from '../../logger.js';

/**
 * Client IP: first X-Forwarded-For entry, else the socket address
 */
export function getClientIp(req: Request): string {
    const forwarded = req.headers['x-forwarded-for'];
    const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    if (first) {
        return first.split(',')[0].trim();
    }
    return req.socket.remoteAddress || 'unknown';
}

export function getRequestId(res: Response): string | undefined {
    const id: unknown = res.locals.requestId;
    return typeof id === 'string' ? id : undefined;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const requestId = crypto.randomUUID().slice(0, 8);
    const startedAt = process.hrtime.bigint();

    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    logger.info(`[${requestId}] ${req.method} ${req.path} from ${getClientIp(req)}`);

    res.on('finish', () => {
        const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
        logger.info(`[${requestId}] Response ${res.statusCode} in ${durationMs.toFixed(2)}ms`);
    });

    next();
}
