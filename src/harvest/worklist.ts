/**
 * Worklist construction
 * Configured sources plus ad hoc URLs, deduplicated by canonical URL.
 */
import { canonicalizeUrl, syntheticSourceId } from '../services/dedup.service.js';
import { GENERIC_EXTRACTOR_ID } from '../extractors/index.js';
import { ConfigurationError } from './errors.js';
import type { Source } from './types.js';

export function buildWorklist(sources: readonly Source[], extraUrls: readonly string[] = []): readonly Source[] {
    const worklist: Source[] = [];
    const seenIds = new Set<string>();
    const seenUrls = new Set<string>();

    for (const source of sources) {
        if (seenIds.has(source.id)) {
            throw new ConfigurationError(`Duplicate source id: ${source.id}`);
        }
        seenIds.add(source.id);
        seenUrls.add(canonicalizeUrl(source.url));
        worklist.push(Object.freeze({ ...source }));
    }

    for (const url of extraUrls) {
        const canonical = canonicalizeUrl(url);
        if (seenUrls.has(canonical)) {
            continue;
        }

        const id = syntheticSourceId(url);
        if (seenIds.has(id)) {
            throw new ConfigurationError(`Ad hoc URL ${url} collides with source id ${id}`);
        }

        seenUrls.add(canonical);
        seenIds.add(id);
        worklist.push(Object.freeze({ id, url, extractorId: GENERIC_EXTRACTOR_ID }));
    }

    return Object.freeze(worklist);
}
