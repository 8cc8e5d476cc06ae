/**
 * HTTP Fetcher
 * One GET per URL with per-attempt timeout, exponential backoff and rotating identity.
 * Every failure path is returned as a FetchOutcome; nothing is thrown.
 */
import { createLogger } from '../observability/logger.js';
import { fetchAttemptsTotal, fetchDuration } from '../observability/metrics.js';
import { HttpStatusError, type TransportError } from '../harvest/errors.js';
import { sleep } from '../utils/time.js';
import { buildHeaders, pickUserAgent } from './user-agents.js';
import type { HttpSession } from './session.js';
import type { FetchFailure, FetchOutcome } from '../harvest/types.js';

export const DEFAULT_MAX_RETRIES = 3;

export interface HttpFetcherOptions {
    timeoutMs: number;
    backoffBaseMs: number;
    userAgent?: () => string;
}

/**
 * What the orchestrator needs from a fetcher
 */
export interface PageFetcher {
    fetch(url: string, maxRetries?: number, signal?: AbortSignal): Promise<FetchOutcome>;
}

type AttemptResult =
    | { ok: true; body: string }
    | { ok: false; error: TransportError | HttpStatusError; status?: number };

/**
 * Delay before the retry that follows attempt `attempt` (0-based)
 */
export function backoffDelayMs(attempt: number, baseMs: number): number {
    return Math.pow(2, attempt) * baseMs;
}

export class HttpFetcher implements PageFetcher {
    private readonly session: HttpSession;
    private readonly options: HttpFetcherOptions;

    constructor(session: HttpSession, options: HttpFetcherOptions) {
        this.session = session;
        this.options = options;
    }

    async fetch(url: string, maxRetries: number = DEFAULT_MAX_RETRIES, signal?: AbortSignal): Promise<FetchOutcome> {
        const fetchLogger = createLogger({ url, stage: 'fetch' });
        const startTime = Date.now();
        let attempts = 0;
        let lastStatus: number | undefined;

        for (let attempt = 0; attempt < maxRetries; attempt++) {
            if (this.isCancelled(signal)) {
                return this.cancelledOutcome(url, startTime, attempts, lastStatus);
            }

            attempts++;
            const result = await this.attempt(url, signal);

            if (result.ok) {
                const elapsedMs = Date.now() - startTime;
                fetchAttemptsTotal.inc({ outcome: 'ok' });
                fetchDuration.observe({ result: 'success' }, elapsedMs / 1000);
                fetchLogger.info('Fetched page', { attempt: attempt + 1, elapsedMs });
                return { ok: true, url, payload: result.body, status: 200, elapsedMs, attempts };
            }

            if (this.isCancelled(signal)) {
                fetchAttemptsTotal.inc({ outcome: 'cancelled' });
                return this.cancelledOutcome(url, startTime, attempts, lastStatus);
            }

            lastStatus = result.status ?? lastStatus;
            fetchAttemptsTotal.inc({ outcome: attemptOutcomeLabel(result.error) });
            fetchLogger.warn('Fetch attempt failed', {
                attempt: attempt + 1,
                maxRetries,
                reason: result.error.message,
            });

            if (attempt < maxRetries - 1) {
                await sleep(backoffDelayMs(attempt, this.options.backoffBaseMs), signal);
            }
        }

        const elapsedMs = Date.now() - startTime;
        fetchDuration.observe({ result: 'failure' }, elapsedMs / 1000);
        fetchLogger.error('Fetch failed', undefined, { attempts, elapsedMs });

        return {
            ok: false,
            url,
            reason: `failed after ${maxRetries} attempts`,
            status: lastStatus,
            elapsedMs,
            attempts,
            cancelled: false,
        };
    }

    private async attempt(url: string, signal?: AbortSignal): Promise<AttemptResult> {
        const userAgent = (this.options.userAgent ?? pickUserAgent)();
        const response = await this.session.request(url, {
            headers: buildHeaders(userAgent),
            timeoutMs: this.options.timeoutMs,
            signal,
        });

        if (!response.ok) {
            return { ok: false, error: response.error };
        }

        if (response.status !== 200) {
            return { ok: false, error: new HttpStatusError(response.status), status: response.status };
        }

        return { ok: true, body: response.body };
    }

    private isCancelled(signal?: AbortSignal): boolean {
        return Boolean(signal?.aborted) || !this.session.isOpen;
    }

    private cancelledOutcome(url: string, startTime: number, attempts: number, status?: number): FetchFailure {
        const elapsedMs = Date.now() - startTime;
        fetchDuration.observe({ result: 'cancelled' }, elapsedMs / 1000);
        return { ok: false, url, reason: 'cancelled', status, elapsedMs, attempts, cancelled: true };
    }
}

function attemptOutcomeLabel(error: TransportError | HttpStatusError): string {
    if (error instanceof HttpStatusError) {
        return 'http_status';
    }
    return error.timedOut ? 'timeout' : 'transport';
}
