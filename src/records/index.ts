/**
 * Persistence collaborator factory
 */
import { config as appConfig, type Config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { RecordsApiClient } from './client.js';
import { MemoryPlayerStore } from './memory-store.js';
import type { PlayerStore } from './types.js';

/**
 * Records API client when RECORDS_API_URL is set, in-memory store otherwise
 */
export function createPlayerStore(cfg: Config = appConfig): PlayerStore {
    if (!cfg.recordsApiUrl) {
        logger.warn('RECORDS_API_URL not set, player rows are kept in memory only');
        return new MemoryPlayerStore();
    }

    return new RecordsApiClient({
        baseUrl: cfg.recordsApiUrl,
        token: cfg.recordsApiToken,
        breaker: new CircuitBreaker({
            name: 'records-api',
            failureThreshold: cfg.cbFailureThreshold,
            resetTimeout: cfg.cbResetTimeoutMs,
            halfOpenRequests: cfg.cbHalfOpenRequests,
        }),
    });
}

export { RecordsApiClient, type RecordsApiClientOptions } from './client.js';
export { MemoryPlayerStore } from './memory-store.js';
export { CircuitBreaker, CircuitState, CircuitOpenError, type CircuitBreakerConfig } from './circuit-breaker.js';
export * from './types.js';
