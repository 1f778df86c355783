import { Router, Request, Response } from 'express';
import { API_NAME, API_VERSION, ENDPOINTS_INFO } from '../../weather/constants.js';

export interface SystemStatus {
    database: string;
    cache: string;
    externalApi: string;
}

export function createSystemRouter(status: SystemStatus): Router {
    const router = Router();

    // GET /api/health
    router.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            version: API_VERSION,
            services: {
                database: status.database,
                cache: status.cache,
                external_api: status.externalApi,
            },
        });
    });

    // GET /api/info
    router.get('/info', (req: Request, res: Response) => {
        res.json({
            api_name: API_NAME,
            version: API_VERSION,
            endpoints: ENDPOINTS_INFO,
        });
    });

    return router;
}
