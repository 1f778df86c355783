import express, { Express } from 'express';
import compression from 'compression';
import cors from 'cors';
import { ForecastResolver } from '../weather/forecast-resolver.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import { securityHeaders } from './middleware/security-headers.js';
import { ClientThrottle, throttle } from './middleware/throttle.js';
import { createSystemRouter, SystemStatus } from './routes/system-routes.js';
import { createWeatherRouter } from './routes/weather-routes.js';

export interface AppDeps {
    resolver: ForecastResolver;
    status: SystemStatus;
    throttler?: ClientThrottle; // weather routes are unthrottled without one
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.disable('x-powered-by');

    // Middleware
    app.use(requestLogger);
    app.use(securityHeaders);
    app.use(compression());
    app.use(cors());
    app.use(express.json());

    // API Routes
    const weatherRouter = createWeatherRouter(deps.resolver);
    if (deps.throttler) {
        app.use('/api/weather', throttle(deps.throttler), weatherRouter);
    } else {
        app.use('/api/weather', weatherRouter);
    }
    app.use('/api', createSystemRouter(deps.status));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
