/**
 * Extractor types and interfaces
 */
import type { ExtractionError } from '../harvest/errors.js';
import type { NormalizedRecord, RecordFields } from '../harvest/types.js';

/**
 * What an extractor pulls out of a page, before provenance is attached
 */
export interface ExtractedPage {
    site: string;
    title: string;
    collections: NormalizedRecord['collections'];
    fields: RecordFields;
}

/**
 * Extractor interface - every source-specific parser implements this
 */
export interface Extractor {
    id: string;
    site: string;
    extract(html: string): ExtractedPage;
}

export type ExtractionResult =
    | { ok: true; record: NormalizedRecord }
    | { ok: false; error: ExtractionError };
