/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const positiveIntSchema = z.coerce.number().int().positive();
const nonNegativeIntSchema = z.coerce.number().int().min(0);

// Configuration schema
const configSchema = z.object({
    // Harvest
    harvestConcurrency: positiveIntSchema.default(5),
    dispatchDelayMs: nonNegativeIntSchema.default(100),
    fetchTimeoutMs: positiveIntSchema.default(10000),
    fetchMaxRetries: positiveIntSchema.default(3),
    backoffBaseMs: nonNegativeIntSchema.default(1000),
    runTimeoutMs: positiveIntSchema.nullable().default(null),

    // Sources & results
    sourcesPath: z.string().nullable().default(null),
    resultsDir: z.string().default('data/scraping_results'),

    // Optional - Records API (persistence collaborator)
    recordsApiUrl: urlSchema.nullable().default(null),
    recordsApiToken: z.string().nullable().default(null),

    // Continuous mode
    harvestIntervalMinutes: positiveIntSchema.default(30),
    harvestRetryDelayMs: positiveIntSchema.default(60000),

    // Logging & Metrics
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    metricsTextfilePath: z.string().nullable().default(null),

    // Circuit Breaker Tuning
    cbFailureThreshold: positiveIntSchema.default(5),
    cbResetTimeoutMs: positiveIntSchema.default(30000),
    cbHalfOpenRequests: positiveIntSchema.default(3),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
    return {
        harvestConcurrency: env.HARVEST_CONCURRENCY,
        dispatchDelayMs: env.DISPATCH_DELAY_MS,
        fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
        fetchMaxRetries: env.FETCH_MAX_RETRIES,
        backoffBaseMs: env.BACKOFF_BASE_MS,
        runTimeoutMs: env.RUN_TIMEOUT_MS || null,

        sourcesPath: env.SOURCES_PATH || null,
        resultsDir: env.RESULTS_DIR,

        recordsApiUrl: env.RECORDS_API_URL || null,
        recordsApiToken: env.RECORDS_API_TOKEN || null,

        harvestIntervalMinutes: env.HARVEST_INTERVAL_MINUTES,
        harvestRetryDelayMs: env.HARVEST_RETRY_DELAY_MS,

        logLevel: env.LOG_LEVEL,
        metricsTextfilePath: env.METRICS_TEXTFILE_PATH || null,

        cbFailureThreshold: env.CB_FAILURE_THRESHOLD,
        cbResetTimeoutMs: env.CB_RESET_TIMEOUT_MS,
        cbHalfOpenRequests: env.CB_HALF_OPEN_REQUESTS,
    };
}

/**
 * Parse configuration from an environment map
 * Returns the list of offending variables instead of exiting
 */
export function parseConfig(env: NodeJS.ProcessEnv): { config: Config } | { errors: string[] } {
    const result = configSchema.safeParse(mapEnvToConfig(env));

    if (!result.success) {
        return {
            errors: result.error.issues.map(issue => {
                const envVar = pathToEnvVar(issue.path.join('.'));
                return `  - ${envVar}: ${issue.message}`;
            }),
        };
    }

    return { config: result.data };
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    const parsed = parseConfig(process.env);

    if ('errors' in parsed) {
        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(parsed.errors.join('\n'));
        console.error('\nSee .env.example for supported configuration.\n');

        process.exit(1);
    }

    return parsed.config;
}

/**
 * Convert config path to environment variable name
 */
export function pathToEnvVar(path: string): string {
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        harvestConcurrency: cfg.harvestConcurrency,
        dispatchDelayMs: cfg.dispatchDelayMs,
        fetchTimeoutMs: cfg.fetchTimeoutMs,
        fetchMaxRetries: cfg.fetchMaxRetries,
        backoffBaseMs: cfg.backoffBaseMs,
        runTimeoutMs: cfg.runTimeoutMs,
        sourcesPath: cfg.sourcesPath,
        resultsDir: cfg.resultsDir,
        recordsApiUrl: cfg.recordsApiUrl,
        recordsApiToken: cfg.recordsApiToken ? '[REDACTED]' : null,
        harvestIntervalMinutes: cfg.harvestIntervalMinutes,
        logLevel: cfg.logLevel,
        metricsTextfilePath: cfg.metricsTextfilePath,
        cbFailureThreshold: cfg.cbFailureThreshold,
        cbResetTimeoutMs: cfg.cbResetTimeoutMs,
    };
}

// Export singleton config
export const config = loadConfig();
