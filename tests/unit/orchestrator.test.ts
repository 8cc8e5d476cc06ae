/**
 * Harvest Orchestrator Tests
 * Uses a scripted fetcher so completion order and outcomes are controlled
 */
import { describe, it, expect, vi } from 'vitest';
import { HarvestOrchestrator } from '../../src/harvest/orchestrator.js';
import { ExtractorRegistry, createBaselineExtractor } from '../../src/extractors/index.js';
import { ConfigurationError } from '../../src/harvest/errors.js';
import type { PageFetcher } from '../../src/fetchers/http.fetcher.js';
import type { ResultSink } from '../../src/sinks/result-sink.js';
import type { FetchOutcome, HarvestState, Source } from '../../src/harvest/types.js';

vi.mock('../../src/observability/logger.js', () => {
    const mockLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
    mockLogger.child.mockReturnValue(mockLogger);
    return { logger: mockLogger, createLogger: () => mockLogger };
});

type Script = { delayMs: number; outcome: (url: string) => FetchOutcome } | { delayMs: number; crash: Error };

const ok = (payload: string) => (url: string): FetchOutcome => ({
    ok: true, url, payload, status: 200, elapsedMs: 5, attempts: 1,
});

const failed = (status: number) => (url: string): FetchOutcome => ({
    ok: false, url, reason: 'failed after 3 attempts', status, elapsedMs: 30, attempts: 3, cancelled: false,
});

class ScriptedFetcher implements PageFetcher {
    readonly calls: string[] = [];

    constructor(private readonly scripts: Record<string, Script>) { }

    async fetch(url: string): Promise<FetchOutcome> {
        this.calls.push(url);
        const script = this.scripts[url];
        if (!script) {
            throw new Error(`No script for ${url}`);
        }
        await new Promise(resolve => setTimeout(resolve, script.delayMs));
        if ('crash' in script) {
            throw script.crash;
        }
        return script.outcome(url);
    }
}

function registry(): ExtractorRegistry {
    return new ExtractorRegistry()
        .register(createBaselineExtractor({ id: 'generic', site: 'Test' }))
        .register({
            id: 'broken',
            site: 'Broken',
            extract: () => { throw new Error('layout changed'); },
        });
}

const source = (id: string, extractorId = 'generic'): Source => ({ id, url: `https://example.test/${id}`, extractorId });

describe('HarvestOrchestrator', () => {
    it('should produce exactly one entry per source', async () => {
        const fetcher = new ScriptedFetcher({
            'https://example.test/a': { delayMs: 1, outcome: ok('<h3>Goal!</h3>') },
            'https://example.test/b': { delayMs: 1, outcome: failed(503) },
            'https://example.test/c': { delayMs: 1, outcome: ok('<h3>Ignored</h3>') },
        });
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry() });

        const report = await orchestrator.run(
            [source('a'), source('b'), source('c', 'broken')],
            [],
            { concurrency: 2, dispatchDelayMs: 0 }
        );

        expect(Object.keys(report.entries)).toEqual(['a', 'b', 'c']);
        expect(report.entries.a).toMatchObject({
            status: 'success',
            record: { site: 'Test', title: 'No title', collections: { articles: ['Goal!'] } },
        });
        expect(report.entries.b).toEqual({
            status: 'fetch_failed',
            url: 'https://example.test/b',
            failure: 'failed after 3 attempts',
            attempts: 3,
            elapsedMs: 30,
            statusCode: 503,
        });
        expect(report.entries.c).toMatchObject({
            status: 'extraction_failed',
            sourceId: 'c',
            failure: 'Error: layout changed',
            provenance: { statusCode: 200, responseTimeMs: 5 },
        });
        expect(report.summary).toEqual({ total: 3, succeeded: 1, fetchFailed: 1, extractionFailed: 1, incomplete: 0 });
        expect(report.complete).toBe(true);
    });

    it('should match results to sources regardless of completion order', async () => {
        const fetcher = new ScriptedFetcher({
            'https://example.test/slow': { delayMs: 40, outcome: ok('<title>Slow</title>') },
            'https://example.test/fast': { delayMs: 1, outcome: ok('<title>Fast</title>') },
        });
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry() });

        const report = await orchestrator.run([source('slow'), source('fast')], [], { concurrency: 2, dispatchDelayMs: 0 });

        expect(report.entries.slow).toMatchObject({ status: 'success', record: { title: 'Slow' } });
        expect(report.entries.fast).toMatchObject({ status: 'success', record: { title: 'Fast' } });
    });

    it('should record a crashed fetch task as a fetch failure', async () => {
        const fetcher = new ScriptedFetcher({
            'https://example.test/a': { delayMs: 1, crash: new RangeError('bad state') },
            'https://example.test/b': { delayMs: 1, outcome: ok('<h3>Fine</h3>') },
        });
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry() });

        const report = await orchestrator.run([source('a'), source('b')], [], { dispatchDelayMs: 0 });

        expect(report.entries.a).toEqual({
            status: 'fetch_failed',
            url: 'https://example.test/a',
            failure: 'RangeError: bad state',
            attempts: 0,
            elapsedMs: 0,
        });
        expect(report.entries.b.status).toBe('success');
    });

    it('should walk through every state in order', async () => {
        const fetcher = new ScriptedFetcher({ 'https://example.test/a': { delayMs: 1, outcome: ok('') } });
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry() });
        const states: HarvestState[] = [];

        expect(orchestrator.state).toBe('Idle');
        await orchestrator.run([source('a')], [], { dispatchDelayMs: 0, onStateChange: state => states.push(state) });

        expect(states).toEqual(['Idle', 'Dispatching', 'Awaiting', 'Aggregating', 'Done']);
        expect(orchestrator.state).toBe('Done');
    });

    it('should reject an unregistered extractor before any fetch', async () => {
        const fetcher = new ScriptedFetcher({});
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry() });

        await expect(orchestrator.run([source('a'), source('x', 'missing')])).rejects.toThrow(ConfigurationError);
        expect(fetcher.calls).toEqual([]);
    });

    it('should refuse a second run while one is in progress', async () => {
        const fetcher = new ScriptedFetcher({ 'https://example.test/a': { delayMs: 20, outcome: ok('') } });
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry() });

        const first = orchestrator.run([source('a')], [], { dispatchDelayMs: 0 });

        await expect(orchestrator.run([source('a')])).rejects.toThrow('Harvest already running (state: Awaiting)');
        await first;
    });

    it('should return a frozen report and hand it to the sink', async () => {
        const fetcher = new ScriptedFetcher({ 'https://example.test/a': { delayMs: 1, outcome: ok('<h3>Goal!</h3>') } });
        const persist = vi.fn<ResultSink['persist']>().mockResolvedValue({ snapshotPath: null, inserted: 0, dropped: 0, errors: [] });
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry(), sink: { persist } });

        const report = await orchestrator.run([source('a')], [], { dispatchDelayMs: 0, snapshotName: 'unit.json' });

        expect(persist).toHaveBeenCalledWith(report, 'unit.json');
        expect(Object.isFrozen(report)).toBe(true);
        expect(Object.isFrozen(report.entries.a)).toBe(true);
    });

    it('should still return the report when the sink throws', async () => {
        const fetcher = new ScriptedFetcher({ 'https://example.test/a': { delayMs: 1, outcome: ok('<h3>Goal!</h3>') } });
        const persist = vi.fn<ResultSink['persist']>().mockRejectedValue(new Error('disk gone'));
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry(), sink: { persist } });

        const report = await orchestrator.run([source('a')], [], { dispatchDelayMs: 0 });

        expect(persist).toHaveBeenCalledTimes(1);
        expect(report.entries.a).toMatchObject({ status: 'success' });
        expect(report.summary.total).toBe(1);
        expect(orchestrator.state).toBe('Done');
    });

    it('should add ad hoc URLs under synthetic ids', async () => {
        const fetcher = new ScriptedFetcher({
            'https://example.test/a': { delayMs: 1, outcome: ok('') },
            'https://other.example.test/table': { delayMs: 1, outcome: ok('<h3>Table</h3>') },
        });
        const orchestrator = new HarvestOrchestrator({ fetcher, registry: registry() });

        const report = await orchestrator.run([source('a')], ['https://other.example.test/table'], { dispatchDelayMs: 0 });

        expect(Object.keys(report.entries)).toEqual(['a', 'adhoc:https://other.example.test/table']);
        expect(report.entries['adhoc:https://other.example.test/table']).toMatchObject({
            status: 'success',
            record: { collections: { articles: ['Table'] } },
        });
    });
});
