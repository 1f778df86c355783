/**
 * Weather Override API
 * Entry point
 */

import { createServer } from 'http';
import { MemoryCache } from './cache/memory-cache.js';
import { config } from './config.js';
import { describeError, logger } from './logger.js';
import { InMemoryOverrideStore, OverrideStore } from './store/override-store.js';
import { PgOverrideStore } from './store/pg-override-store.js';
import { ForecastResolver } from './weather/forecast-resolver.js';
import { OpenWeatherClient } from './weather/openweather-client.js';
import { WeatherPayload } from './weather/types.js';
import { ClientThrottle } from './web/middleware/throttle.js';
import { createApp } from './web/server.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
        reason: describeError(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
        error: error.message,
        stack: error.stack
    });
    process.exit(1);
});

async function createStore(): Promise<OverrideStore> {
    if (!config.databaseUrl) {
        logger.warn('DATABASE_URL not set, custom forecasts are kept in memory only');
        return new InMemoryOverrideStore();
    }
    const store = PgOverrideStore.fromUrl(config.databaseUrl);
    await store.ensureSchema();
    return store;
}

async function main(): Promise<void> {
    const store = await createStore();
    const provider = new OpenWeatherClient();
    const resolver = new ForecastResolver({
        provider,
        store,
        cache: new MemoryCache<WeatherPayload>({ maxEntries: config.cacheMaxEntries }),
        ttl: {
            currentSeconds: config.cacheTtlCurrentSeconds,
            forecastSeconds: config.cacheTtlForecastSeconds,
        },
    });

    const app = createApp({
        resolver,
        status: {
            database: config.databaseUrl ? 'postgres' : 'memory',
            cache: 'available',
            externalApi: provider.isConfigured() ? 'configured' : 'missing api key',
        },
        throttler: new ClientThrottle(config.throttlePerHour),
    });

    const server = createServer(app);
    server.listen(config.port, () => {
        logger.info(`Weather API listening on port ${config.port}`);
    });

    // Handle graceful shutdown
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        server.close(() => {
            store.close()
                .then(() => process.exit(0))
                .catch(error => {
                    logger.error('Failed to close store', { error: describeError(error) });
                    process.exit(1);
                });
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
    logger.error('Fatal error', { error: describeError(error), stack: error instanceof Error ? error.stack : undefined });
    process.exit(1);
});
