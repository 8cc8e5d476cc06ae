/**
 * Concurrency limiter
 * Bounds the number of tasks in flight and paces dispatches with a fixed delay.
 * FIFO dispatch; completion order is unconstrained.
 */
import pLimit from 'p-limit';
import { inFlightFetches } from '../observability/metrics.js';
import { DispatchCancelledError } from '../harvest/errors.js';
import { sleep } from '../utils/time.js';

export interface ConcurrencyLimiterConfig {
    concurrency: number;
    dispatchDelayMs: number;
}

export class ConcurrencyLimiter {
    private readonly config: ConcurrencyLimiterConfig;
    private readonly limit: ReturnType<typeof pLimit>;
    private active = 0;
    private peak = 0;

    constructor(config: ConcurrencyLimiterConfig) {
        if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, got ${config.concurrency}`);
        }
        this.config = config;
        this.limit = pLimit(config.concurrency);
    }

    /**
     * Run `task` once a slot is free. Rejects with DispatchCancelledError,
     * without starting the task, if the signal aborts before dispatch.
     */
    run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        return this.limit(async () => {
            // Slots of cancelled entries are handed straight on
            if (signal?.aborted) {
                throw new DispatchCancelledError();
            }

            this.take();
            try {
                await sleep(this.config.dispatchDelayMs, signal);
                if (signal?.aborted) {
                    throw new DispatchCancelledError();
                }
                return await task();
            } finally {
                this.release();
            }
        });
    }

    get inFlight(): number {
        return this.active;
    }

    get peakInFlight(): number {
        return this.peak;
    }

    get pending(): number {
        return this.limit.pendingCount;
    }

    private take(): void {
        this.active++;
        this.peak = Math.max(this.peak, this.active);
        inFlightFetches.inc();
    }

    private release(): void {
        this.active--;
        inFlightFetches.dec();
    }
}
