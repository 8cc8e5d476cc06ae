/**
 * Records API client with circuit breaker protection
 * HTTP implementation of the PlayerStore contract.
 */
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createLogger } from '../observability/logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import type { PlayerRow, PlayerStore, TableStats } from './types.js';

export interface RecordsApiClientOptions {
    baseUrl: string;
    token: string | null;
    breaker?: CircuitBreaker;
}

const bulkInsertResponseSchema = z.object({
    inserted: z.number().int().min(0),
    failed: z.array(z.object({
        index: z.number().int(),
        error: z.string(),
    })).default([]),
});

const statsResponseSchema = z.record(z.union([z.number().int().min(0), z.literal('error')]));

export class RecordsApiClient implements PlayerStore {
    private readonly baseUrl: string;
    private readonly token: string | null;
    private readonly breaker: CircuitBreaker;

    constructor(options: RecordsApiClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.token = options.token;
        this.breaker = options.breaker ?? new CircuitBreaker({ name: 'records-api' });
    }

    /**
     * Insert player rows. Partial insert errors are logged, not thrown.
     */
    async bulkInsert(rows: PlayerRow[]): Promise<void> {
        if (rows.length === 0) {
            return;
        }

        const requestId = uuidv4();
        const reqLogger = createLogger({ stage: 'persist' });
        const raw = await this.breaker.execute(() =>
            this.makeRequest('POST', '/players/bulk', { players: rows }, requestId)
        );
        const response = bulkInsertResponseSchema.parse(raw);

        if (response.failed.length > 0) {
            reqLogger.warn('Records API rejected some player rows', {
                requestId,
                inserted: response.inserted,
                failed: response.failed.map(failure => ({
                    name: rows[failure.index]?.name,
                    error: failure.error,
                })),
            });
            return;
        }

        reqLogger.info('Player rows inserted', { requestId, inserted: response.inserted });
    }

    async getTableStats(): Promise<TableStats> {
        const raw = await this.breaker.execute(() => this.makeRequest('GET', '/stats'));
        const counts = statsResponseSchema.parse(raw);

        return {
            countries: counts.countries ?? 'error',
            competitions: counts.competitions ?? 'error',
            clubs: counts.clubs ?? 'error',
            players: counts.players ?? 'error',
            matches: counts.matches ?? 'error',
        };
    }

    private buildHeaders(requestId: string): Record<string, string> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            'X-Service-Name': 'pitchside-harvester',
            'X-Request-ID': requestId,
        };
        if (this.token) {
            headers['Authorization'] = `Bearer ${this.token}`;
        }
        return headers;
    }

    private async makeRequest(method: string, path: string, body?: unknown, requestId: string = uuidv4()): Promise<unknown> {
        const reqLogger = createLogger({ stage: 'persist' });
        reqLogger.debug(`Records API ${method} ${path}`, { requestId });

        const response = await fetch(`${this.baseUrl}${path}`, {
            method,
            headers: this.buildHeaders(requestId),
            body: body === undefined ? undefined : JSON.stringify(body),
        });

        if (!response.ok) {
            const errorBody = await response.text();
            reqLogger.error(`Records API error: ${response.status}`, undefined, {
                requestId,
                status: response.status,
                body: errorBody,
            });
            throw new Error(`Records API error: ${response.status} - ${errorBody}`);
        }

        return response.json();
    }
}
