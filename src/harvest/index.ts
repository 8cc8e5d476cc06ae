/**
 * Harvest entry point
 * Wires session, fetcher, registry and sink from configuration.
 */
import { config } from '../config/index.js';
import { createDefaultRegistry, type ExtractorRegistry } from '../extractors/index.js';
import { HttpFetcher, withHttpSession, type HttpFetcherOptions } from '../fetchers/index.js';
import { createPlayerStore } from '../records/index.js';
import { ResultSink } from '../sinks/result-sink.js';
import { HarvestOrchestrator, type HarvestRunOptions } from './orchestrator.js';
import type { HarvestReport, Source } from './types.js';

export interface RunHarvestOptions extends Omit<HarvestRunOptions, 'concurrency'> {
    registry?: ExtractorRegistry;
    // undefined: sink built from config; null: no persistence
    sink?: ResultSink | null;
    fetcher?: Partial<HttpFetcherOptions>;
}

export function createResultSink(): ResultSink {
    return new ResultSink({ store: createPlayerStore(), resultsDir: config.resultsDir });
}

/**
 * Harvest `sources` plus any ad hoc URLs. The HTTP session lives exactly as
 * long as the run.
 */
export async function runHarvest(
    sources: readonly Source[],
    extraUrls: readonly string[] = [],
    concurrency: number = config.harvestConcurrency,
    options: RunHarvestOptions = {}
): Promise<HarvestReport> {
    const { registry, sink, fetcher: fetcherOptions, ...runOptions } = options;

    return withHttpSession(async session => {
        const fetcher = new HttpFetcher(session, {
            timeoutMs: config.fetchTimeoutMs,
            backoffBaseMs: config.backoffBaseMs,
            ...fetcherOptions,
        });
        const orchestrator = new HarvestOrchestrator({
            fetcher,
            registry: registry ?? createDefaultRegistry(),
            sink: sink === undefined ? createResultSink() : sink,
        });

        return orchestrator.run(sources, extraUrls, {
            dispatchDelayMs: config.dispatchDelayMs,
            maxRetries: config.fetchMaxRetries,
            runTimeoutMs: config.runTimeoutMs,
            ...runOptions,
            concurrency,
        });
    });
}

export { HarvestOrchestrator, DEFAULT_CONCURRENCY, type HarvestRunOptions, type HarvestDependencies } from './orchestrator.js';
export { buildWorklist } from './worklist.js';
export * from './errors.js';
export * from './types.js';
