/**
 * Harvest source configuration
 * Built-in football sites, or a JSON file of the form { "sources": [...] }
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { ConfigurationError, errorSummary } from '../harvest/errors.js';
import type { Source } from '../harvest/types.js';

export const DEFAULT_SOURCES: readonly Source[] = [
    { id: 'bbc_sport', url: 'https://www.bbc.com/sport/football', extractorId: 'bbc_sport' },
    { id: 'sky_sports', url: 'https://www.skysports.com/football', extractorId: 'sky_sports' },
    { id: 'espn', url: 'https://www.espn.com/soccer/', extractorId: 'espn' },
    { id: 'goal', url: 'https://www.goal.com/en', extractorId: 'goal' },
    { id: 'transfermarkt', url: 'https://www.transfermarkt.com', extractorId: 'transfermarkt' },
];

const sourceFileSchema = z.object({
    sources: z.array(
        z.object({
            id: z.string().min(1, 'Source id is required'),
            url: z.string().url('Must be a valid URL'),
            // Defaults to the source id
            extractorId: z.string().min(1).optional(),
        })
    ).min(1, 'At least one source is required'),
});

/**
 * Parse the contents of a sources file
 */
export function parseSources(raw: unknown): Source[] {
    const result = sourceFileSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid sources file: ${issues}`);
    }

    return result.data.sources.map(source => ({
        id: source.id,
        url: source.url,
        extractorId: source.extractorId ?? source.id,
    }));
}

/**
 * Load sources from file or use defaults
 */
export async function loadSources(path: string | null): Promise<Source[]> {
    if (!path) {
        logger.debug('Using default sources', { count: DEFAULT_SOURCES.length });
        return [...DEFAULT_SOURCES];
    }

    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError(`Cannot read sources file ${path}: ${errorSummary(error)}`);
    }

    const sources = parseSources(raw);
    logger.info('Loaded sources from file', { path, count: sources.length });
    return sources;
}
