/**
 * Retry and failure-classification stages wrapped around provider calls.
 *
 * withRetry re-runs an attempt only when it throws TransientFailure; anything
 * else ends the loop immediately. guardProviderCall is the outer stage: weather
 * errors already classified pass through untouched, everything else becomes
 * ProviderUnavailable with the original error as its cause.
 */

import { logger, describeError } from '../logger.js';
import { ProviderUnavailable, WeatherApiError } from './errors.js';

export type TransientKind = 'timeout' | 'connection' | 'server';

/**
 * A failure worth another attempt: timeout, refused/reset connection or a 5xx answer
 */
export class TransientFailure extends Error {
    readonly kind: TransientKind;

    constructor(kind: TransientKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransientFailure';
        this.kind = kind;
    }
}

export interface RetryPolicy {
    maxRetries: number;   // total attempts, including the first
    baseDelayMs: number;  // wait after attempt n is baseDelayMs * n
    sleep?: (ms: number) => Promise<void>;
}

const EXHAUSTED_MESSAGES: Record<TransientKind, string> = {
    timeout: 'Timed out contacting the weather service',
    connection: 'Could not connect to the weather service',
    server: 'The weather service is temporarily unavailable',
};

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export async function withRetry<T>(
    label: string,
    attempt: (attemptNumber: number) => Promise<T>,
    policy: RetryPolicy
): Promise<T> {
    const wait = policy.sleep ?? sleep;
    const attempts = Math.max(1, Math.floor(policy.maxRetries));
    let lastFailure: TransientFailure | undefined;

    for (let attemptNumber = 1; attemptNumber <= attempts; attemptNumber++) {
        try {
            logger.debug(`[Retry] ${label}: attempt ${attemptNumber}/${attempts}`);
            return await attempt(attemptNumber);
        } catch (error) {
            if (!(error instanceof TransientFailure)) throw error;
            lastFailure = error;

            if (attemptNumber < attempts) {
                const delayMs = policy.baseDelayMs * attemptNumber;
                logger.warn(`[Retry] ${label}: ${error.kind} on attempt ${attemptNumber}, retrying in ${delayMs}ms`, {
                    error: error.message,
                });
                await wait(delayMs);
            }
        }
    }

    const kind = lastFailure?.kind ?? 'server';
    logger.error(`[Retry] ${label}: all ${attempts} attempts failed`, { kind, error: lastFailure?.message });
    throw new ProviderUnavailable(EXHAUSTED_MESSAGES[kind], { cause: lastFailure });
}

export async function guardProviderCall<T>(label: string, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (error) {
        if (error instanceof WeatherApiError) throw error;

        logger.error(`[Provider] Unexpected error in ${label}`, { error: describeError(error) });
        throw new ProviderUnavailable(`Failed to fetch weather data: ${describeError(error)}`, { cause: error });
    }
}
