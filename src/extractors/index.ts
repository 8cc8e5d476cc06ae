/**
 * Extractor Registry
 * Explicit extractor table built at startup. Lookups are exact and case-sensitive;
 * extractor failures are converted to ExtractionError values at this boundary.
 */
import { logger } from '../observability/logger.js';
import { ConfigurationError, ExtractionError, errorSummary } from '../harvest/errors.js';
import type { Provenance, Source } from '../harvest/types.js';
import type { Extractor, ExtractionResult } from './types.js';

import { createBaselineExtractor } from './base.extractor.js';
import { bbcSportExtractor } from './sites/bbc-sport.extractor.js';
import { skySportsExtractor } from './sites/sky-sports.extractor.js';
import { espnExtractor } from './sites/espn.extractor.js';
import { transfermarktExtractor } from './sites/transfermarkt.extractor.js';

export const GENERIC_EXTRACTOR_ID = 'generic';

export class ExtractorRegistry {
    private readonly extractors: Map<string, Extractor> = new Map();

    register(extractor: Extractor): this {
        if (this.extractors.has(extractor.id)) {
            throw new ConfigurationError(`Extractor already registered: ${extractor.id}`);
        }
        this.extractors.set(extractor.id, extractor);
        return this;
    }

    get(extractorId: string): Extractor | undefined {
        return this.extractors.get(extractorId);
    }

    has(extractorId: string): boolean {
        return this.extractors.has(extractorId);
    }

    ids(): string[] {
        return Array.from(this.extractors.keys());
    }

    /**
     * Fail before dispatch when any source points at an unknown extractor
     */
    assertResolvable(sources: readonly Source[]): void {
        const missing = sources.filter(source => !this.extractors.has(source.extractorId));
        if (missing.length > 0) {
            const detail = missing.map(source => `${source.id} -> ${source.extractorId}`).join(', ');
            throw new ConfigurationError(`No extractor registered for: ${detail}`);
        }
    }

    extract(source: Source, payload: string, provenance: Provenance): ExtractionResult {
        const extractor = this.extractors.get(source.extractorId);
        if (!extractor) {
            return {
                ok: false,
                error: new ExtractionError(source.id, `No extractor registered: ${source.extractorId}`),
            };
        }

        try {
            const page = extractor.extract(payload);
            return { ok: true, record: { ...page, provenance } };
        } catch (error) {
            logger.error('Extraction failed', error, { sourceId: source.id, extractorId: extractor.id });
            return {
                ok: false,
                error: new ExtractionError(source.id, errorSummary(error), { cause: error }),
            };
        }
    }
}

/**
 * Registry with every built-in extractor
 */
export function createDefaultRegistry(): ExtractorRegistry {
    return new ExtractorRegistry()
        .register(bbcSportExtractor)
        .register(skySportsExtractor)
        .register(espnExtractor)
        .register(createBaselineExtractor({ id: 'goal', site: 'Goal.com' }))
        .register(transfermarktExtractor)
        .register(createBaselineExtractor({ id: GENERIC_EXTRACTOR_ID, site: 'Ad hoc' }));
}

// Re-export types
export * from './types.js';
export { createBaselineExtractor, NO_TITLE } from './base.extractor.js';
