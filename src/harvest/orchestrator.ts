/**
 * Harvest Orchestrator
 *
 * States: Idle -> Dispatching -> Awaiting -> Aggregating -> Done
 * Every worklist entry ends up in the report exactly once, whatever happened to it.
 */
import { v4 as uuidv4 } from 'uuid';
import { createLogger, type Logger } from '../observability/logger.js';
import { harvestEntriesTotal, harvestRunDuration } from '../observability/metrics.js';
import { ConcurrencyLimiter } from '../services/concurrency-limiter.js';
import { DispatchCancelledError, PersistenceError, errorSummary } from './errors.js';
import { buildWorklist } from './worklist.js';
import type { ExtractorRegistry } from '../extractors/index.js';
import type { PageFetcher } from '../fetchers/http.fetcher.js';
import type { ResultSink } from '../sinks/result-sink.js';
import type {
    FetchOutcome,
    HarvestEntry,
    HarvestReport,
    HarvestState,
    HarvestSummary,
    Source,
} from './types.js';

export const DEFAULT_CONCURRENCY = 5;

export interface HarvestDependencies {
    fetcher: PageFetcher;
    registry: ExtractorRegistry;
    sink?: Pick<ResultSink, 'persist'> | null;
}

export interface HarvestRunOptions {
    concurrency?: number;
    dispatchDelayMs?: number;
    maxRetries?: number;
    signal?: AbortSignal;
    runTimeoutMs?: number | null;
    snapshotName?: string;
    onStateChange?: (state: HarvestState) => void;
}

type DispatchResult =
    | { kind: 'fetched'; outcome: FetchOutcome }
    | { kind: 'not_dispatched' }
    | { kind: 'crashed'; error: unknown };

const DEFAULT_DISPATCH_DELAY_MS = 100;

export class HarvestOrchestrator {
    private readonly deps: HarvestDependencies;
    private current: HarvestState = 'Idle';
    private onStateChange?: (state: HarvestState) => void;

    constructor(deps: HarvestDependencies) {
        this.deps = deps;
    }

    get state(): HarvestState {
        return this.current;
    }

    /**
     * Run one harvest. Rejects only with ConfigurationError, before any dispatch.
     */
    async run(
        sources: readonly Source[],
        extraUrls: readonly string[] = [],
        options: HarvestRunOptions = {}
    ): Promise<HarvestReport> {
        if (this.current !== 'Idle' && this.current !== 'Done') {
            throw new Error(`Harvest already running (state: ${this.current})`);
        }

        const runId = uuidv4();
        const runLogger = createLogger({ runId });
        const startedAt = new Date();
        this.onStateChange = options.onStateChange;
        this.transition('Idle');

        const worklist = buildWorklist(sources, extraUrls);
        this.deps.registry.assertResolvable(worklist);

        const controller = new AbortController();
        const cancel = (): void => controller.abort();
        options.signal?.addEventListener('abort', cancel, { once: true });
        if (options.signal?.aborted) {
            controller.abort();
        }
        const runTimer = options.runTimeoutMs
            ? setTimeout(() => {
                runLogger.warn('Run timeout reached, cancelling', { runTimeoutMs: options.runTimeoutMs });
                controller.abort();
            }, options.runTimeoutMs)
            : null;

        try {
            const limiter = new ConcurrencyLimiter({
                concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
                dispatchDelayMs: options.dispatchDelayMs ?? DEFAULT_DISPATCH_DELAY_MS,
            });

            this.transition('Dispatching');
            runLogger.info('Starting harvest', {
                sources: worklist.length,
                concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
            });
            const pending = worklist.map(source =>
                this.dispatch(source, limiter, controller.signal, options.maxRetries)
            );

            this.transition('Awaiting');
            const settled = await Promise.allSettled(pending);

            this.transition('Aggregating');
            const entries: Record<string, HarvestEntry> = {};
            worklist.forEach((source, index) => {
                const result = settled[index];
                const dispatch: DispatchResult = result.status === 'fulfilled'
                    ? result.value
                    : { kind: 'crashed', error: result.reason };
                entries[source.id] = this.aggregate(source, dispatch, runLogger);
                harvestEntriesTotal.inc({ status: entries[source.id].status });
            });

            const finishedAt = new Date();
            const summary = summarize(entries);
            const report: HarvestReport = deepFreeze({
                runId,
                startedAt: startedAt.toISOString(),
                finishedAt: finishedAt.toISOString(),
                complete: summary.incomplete === 0,
                entries,
                summary,
            });

            this.transition('Done');
            harvestRunDuration.observe(
                { complete: String(report.complete) },
                (finishedAt.getTime() - startedAt.getTime()) / 1000
            );
            runLogger.info(`Harvest completed: ${summary.succeeded}/${summary.total} sites successful`, { ...summary });

            // Sink failures are logged and the report is still returned
            if (this.deps.sink) {
                try {
                    await this.deps.sink.persist(report, options.snapshotName);
                } catch (error) {
                    runLogger.error(
                        'Result sink failed',
                        new PersistenceError('sink', `Sink hand-off failed: ${errorSummary(error)}`, { cause: error })
                    );
                }
            }

            return report;
        } finally {
            if (runTimer) {
                clearTimeout(runTimer);
            }
            options.signal?.removeEventListener('abort', cancel);
        }
    }

    private async dispatch(
        source: Source,
        limiter: ConcurrencyLimiter,
        signal: AbortSignal,
        maxRetries?: number
    ): Promise<DispatchResult> {
        try {
            const outcome = await limiter.run(() => this.deps.fetcher.fetch(source.url, maxRetries, signal), signal);
            return { kind: 'fetched', outcome };
        } catch (error) {
            if (error instanceof DispatchCancelledError) {
                return { kind: 'not_dispatched' };
            }
            return { kind: 'crashed', error };
        }
    }

    private aggregate(source: Source, dispatch: DispatchResult, runLogger: Logger): HarvestEntry {
        const sourceLogger = runLogger.child({ sourceId: source.id, url: source.url });

        if (dispatch.kind === 'not_dispatched') {
            return { status: 'incomplete', url: source.url, reason: 'cancelled before dispatch' };
        }

        if (dispatch.kind === 'crashed') {
            sourceLogger.error('Fetch task crashed', dispatch.error);
            return {
                status: 'fetch_failed',
                url: source.url,
                failure: errorSummary(dispatch.error),
                attempts: 0,
                elapsedMs: 0,
            };
        }

        const { outcome } = dispatch;

        if (!outcome.ok) {
            if (outcome.cancelled) {
                return { status: 'incomplete', url: source.url, reason: 'cancelled in flight' };
            }
            sourceLogger.error(`Failed to scrape ${source.url}: ${outcome.reason}`);
            return {
                status: 'fetch_failed',
                url: source.url,
                failure: outcome.reason,
                attempts: outcome.attempts,
                elapsedMs: outcome.elapsedMs,
                statusCode: outcome.status,
            };
        }

        const provenance = {
            statusCode: outcome.status,
            responseTimeMs: outcome.elapsedMs,
            capturedAt: new Date().toISOString(),
        };
        const extraction = this.deps.registry.extract(source, outcome.payload, provenance);

        if (!extraction.ok) {
            return {
                status: 'extraction_failed',
                sourceId: extraction.error.sourceId,
                failure: extraction.error.message,
                provenance,
            };
        }

        sourceLogger.info(`Successfully parsed ${source.id}`, {
            articles: extraction.record.collections.articles.length,
        });
        return { status: 'success', record: extraction.record };
    }

    private transition(next: HarvestState): void {
        this.current = next;
        this.onStateChange?.(next);
    }
}

function summarize(entries: Record<string, HarvestEntry>): HarvestSummary {
    const summary: HarvestSummary = { total: 0, succeeded: 0, fetchFailed: 0, extractionFailed: 0, incomplete: 0 };
    for (const entry of Object.values(entries)) {
        summary.total++;
        switch (entry.status) {
            case 'success':
                summary.succeeded++;
                break;
            case 'fetch_failed':
                summary.fetchFailed++;
                break;
            case 'extraction_failed':
                summary.extractionFailed++;
                break;
            case 'incomplete':
                summary.incomplete++;
                break;
        }
    }
    return summary;
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
