import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../logger.js';
import { getClientIp } from './request-logger.js';

interface Window {
    count: number;
    startedAt: number;
}

export interface ThrottleDecision {
    allowed: boolean;
    retryAfterSeconds: number;
}

/**
 * Fixed-window request counter per client key
 */
export class ClientThrottle {
    private windows: Map<string, Window> = new Map();

    constructor(
        private readonly limit: number,
        private readonly windowMs: number = 60 * 60 * 1000,
        private readonly now: () => number = Date.now
    ) { }

    hit(key: string): ThrottleDecision {
        const now = this.now();
        let window = this.windows.get(key);

        if (!window || now - window.startedAt >= this.windowMs) {
            window = { count: 0, startedAt: now };
            this.windows.set(key, window);
            this.pruneExpired(now);
        }

        window.count++;
        const retryAfterSeconds = Math.ceil((window.startedAt + this.windowMs - now) / 1000);
        return { allowed: window.count <= this.limit, retryAfterSeconds };
    }

    private pruneExpired(now: number): void {
        // Only sweep occasionally
        if (this.windows.size % 100 !== 0) return;
        for (const [key, window] of this.windows.entries()) {
            if (now - window.startedAt >= this.windowMs) {
                this.windows.delete(key);
            }
        }
    }
}

export function throttle(throttler: ClientThrottle): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const ip = getClientIp(req);
        const decision = throttler.hit(ip);

        if (!decision.allowed) {
            logger.warn(`[Throttle] Rejecting ${req.method} ${req.path} from ${ip}`);
            res.setHeader('Retry-After', String(decision.retryAfterSeconds));
            res.status(429).json({ error: 'Too many requests. Try again later' });
            return;
        }
        next();
    };
}
