#!/usr/bin/env node
/**
 * Pitchside Harvester - command line entry point
 *
 * Usage: pitchside-harvest [--watch] [url ...]
 * - Harvests the configured sources plus any URLs given on the command line
 * - --watch repeats the harvest every HARVEST_INTERVAL_MINUTES
 * - SIGINT/SIGTERM cancel the current run; the partial report is still saved
 */
import { writeFile } from 'fs/promises';
import { config, getRedactedConfig } from './config/index.js';
import { loadSources } from './config/sources.js';
import { logger } from './observability/logger.js';
import { getMetrics } from './observability/metrics.js';
import { createResultSink, runHarvest } from './harvest/index.js';
import { startContinuousHarvest, type ContinuousHarvestHandle } from './services/scheduler.service.js';
import type { ResultSink } from './sinks/result-sink.js';
import type { HarvestReport, Source } from './harvest/types.js';

interface CliArgs {
    watch: boolean;
    urls: string[];
}

function parseArgs(argv: string[]): CliArgs {
    return {
        watch: argv.includes('--watch'),
        urls: argv.filter(arg => !arg.startsWith('--')),
    };
}

async function exportMetrics(): Promise<void> {
    if (!config.metricsTextfilePath) {
        return;
    }
    try {
        await writeFile(config.metricsTextfilePath, await getMetrics(), 'utf-8');
    } catch (error) {
        logger.warn('Failed to export metrics', { path: config.metricsTextfilePath, error: String(error) });
    }
}

async function harvestOnce(
    sources: Source[],
    urls: string[],
    sink: ResultSink,
    signal: AbortSignal
): Promise<HarvestReport> {
    const report = await runHarvest(sources, urls, config.harvestConcurrency, { signal, sink });
    const stats = await sink.tableStats();
    if (stats) {
        logger.info('Database statistics', stats);
    }
    await exportMetrics();
    return report;
}

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));
    logger.info('Starting Pitchside Harvester...');
    logger.info('Configuration loaded', getRedactedConfig(config));

    const sources = await loadSources(config.sourcesPath);
    const sink = createResultSink();
    const controller = new AbortController();
    let watcher: ContinuousHarvestHandle | null = null;

    // Graceful shutdown: cancel dispatching, keep what already finished
    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, cancelling harvest...`);
        controller.abort();
        if (watcher) {
            watcher.stop().catch(error => logger.error('Error stopping continuous harvest', error));
        }
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    if (args.watch) {
        watcher = startContinuousHarvest({
            intervalMs: config.harvestIntervalMinutes * 60000,
            retryDelayMs: config.harvestRetryDelayMs,
            runCycle: signal => harvestOnce(sources, args.urls, sink, signal),
        });
        return;
    }

    const report = await harvestOnce(sources, args.urls, sink, controller.signal);
    for (const [sourceId, entry] of Object.entries(report.entries)) {
        if (entry.status === 'success') {
            logger.info(`${sourceId}: ${entry.record.title}`, { articles: entry.record.collections.articles.length });
        } else {
            logger.warn(`${sourceId}: ${entry.status}`);
        }
    }
    process.exitCode = report.complete ? 0 : 130;
}

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

main().catch(error => {
    logger.error('Harvester failed', error);
    process.exit(1);
});
