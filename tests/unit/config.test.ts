/**
 * Configuration Tests
 */
import { describe, it, expect } from 'vitest';
import { getRedactedConfig, parseConfig, pathToEnvVar } from '../../src/config/index.js';

describe('parseConfig', () => {
    it('should apply defaults for an empty environment', () => {
        const parsed = parseConfig({});

        expect('config' in parsed).toBe(true);
        if ('config' in parsed) {
            expect(parsed.config).toMatchObject({
                harvestConcurrency: 5,
                dispatchDelayMs: 100,
                fetchTimeoutMs: 10000,
                fetchMaxRetries: 3,
                backoffBaseMs: 1000,
                runTimeoutMs: null,
                resultsDir: 'data/scraping_results',
                recordsApiUrl: null,
                harvestIntervalMinutes: 30,
                logLevel: 'info',
            });
        }
    });

    it('should coerce numeric variables', () => {
        const parsed = parseConfig({ HARVEST_CONCURRENCY: '8', RUN_TIMEOUT_MS: '60000', DISPATCH_DELAY_MS: '0' });

        expect('config' in parsed && parsed.config.harvestConcurrency).toBe(8);
        expect('config' in parsed && parsed.config.runTimeoutMs).toBe(60000);
        expect('config' in parsed && parsed.config.dispatchDelayMs).toBe(0);
    });

    it('should report every invalid variable by its environment name', () => {
        const parsed = parseConfig({ HARVEST_CONCURRENCY: '0', RECORDS_API_URL: 'not-a-url' });

        expect('errors' in parsed).toBe(true);
        if ('errors' in parsed) {
            expect(parsed.errors).toHaveLength(2);
            expect(parsed.errors[0]).toContain('HARVEST_CONCURRENCY');
            expect(parsed.errors[1]).toBe('  - RECORDS_API_URL: Must be a valid URL');
        }
    });
});

describe('pathToEnvVar', () => {
    it('should convert camelCase paths', () => {
        expect(pathToEnvVar('fetchTimeoutMs')).toBe('FETCH_TIMEOUT_MS');
        expect(pathToEnvVar('recordsApiUrl')).toBe('RECORDS_API_URL');
    });
});

describe('getRedactedConfig', () => {
    it('should hide the records API token', () => {
        const parsed = parseConfig({ RECORDS_API_URL: 'https://records.example.test', RECORDS_API_TOKEN: 'test-secret' });

        expect('config' in parsed).toBe(true);
        if ('config' in parsed) {
            const redacted = getRedactedConfig(parsed.config);
            expect(redacted.recordsApiToken).toBe('[REDACTED]');
            expect(redacted.recordsApiUrl).toBe('https://records.example.test');
        }
    });
});
