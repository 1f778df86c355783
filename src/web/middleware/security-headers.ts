import { Request, Response, NextFunction } from 'express';
import { API_NAME, API_VERSION } from '../../weather/constants.js';

export function securityHeaders(req: Request, res: Response, next: NextFunction): void {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-XSS-Protection', '1; mode=block');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');

    if (req.path.startsWith('/api/')) {
        res.setHeader('Content-Security-Policy', "default-src 'none'");
        res.setHeader('X-API-Version', API_VERSION);
        res.setHeader('X-Service-Name', API_NAME);
    }

    next();
}
