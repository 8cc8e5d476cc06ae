/**
 * Harvest data model
 */

/**
 * One configured harvest target
 */
export interface Source {
    readonly id: string;
    readonly url: string;
    readonly extractorId: string;
}

/**
 * Result of one attempt sequence against a URL
 */
export type FetchOutcome = FetchSuccess | FetchFailure;

export interface FetchSuccess {
    ok: true;
    url: string;
    payload: string;
    status: 200;
    elapsedMs: number;
    attempts: number;
}

export interface FetchFailure {
    ok: false;
    url: string;
    reason: string;
    status?: number;
    elapsedMs: number;
    attempts: number;
    cancelled: boolean;
}

/**
 * Capture details attached to every extracted record
 */
export interface Provenance {
    statusCode: number;
    responseTimeMs: number;
    capturedAt: string;
}

/**
 * Player row candidate found on a page; validated by the sink
 */
export interface PlayerCandidate {
    name: string;
    age: number | null;
    club: string;
}

export interface RecordFields {
    players?: PlayerCandidate[];
    [key: string]: unknown;
}

/**
 * Normalized output of an extractor
 */
export interface NormalizedRecord {
    site: string;
    title: string;
    collections: {
        articles: string[];
        [label: string]: string[];
    };
    fields: RecordFields;
    provenance: Provenance;
}

/**
 * Per-source report entry
 */
export type HarvestEntry =
    | { status: 'success'; record: NormalizedRecord }
    | {
        status: 'fetch_failed';
        url: string;
        failure: string;
        attempts: number;
        elapsedMs: number;
        statusCode?: number;
    }
    | {
        status: 'extraction_failed';
        sourceId: string;
        failure: string;
        provenance: Provenance;
    }
    | {
        status: 'incomplete';
        url: string;
        reason: 'cancelled before dispatch' | 'cancelled in flight';
    };

export interface HarvestSummary {
    total: number;
    succeeded: number;
    fetchFailed: number;
    extractionFailed: number;
    incomplete: number;
}

/**
 * One-entry-per-source result of a run
 */
export interface HarvestReport {
    runId: string;
    startedAt: string;
    finishedAt: string;
    complete: boolean;
    entries: Record<string, HarvestEntry>;
    summary: HarvestSummary;
}

export type HarvestState = 'Idle' | 'Dispatching' | 'Awaiting' | 'Aggregating' | 'Done';
