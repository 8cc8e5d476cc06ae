/**
 * Report snapshots
 * Timestamped, 2-space indented JSON files; an existing file is never overwritten.
 */
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { unixSeconds } from '../utils/time.js';
import type { HarvestReport } from '../harvest/types.js';

const MAX_SUFFIX = 1000;

export interface SnapshotOptions {
    dir: string;
    filename?: string;
    now?: Date;
}

export function defaultSnapshotName(now: Date = new Date()): string {
    return `harvest_results_${unixSeconds(now)}.json`;
}

function isAlreadyExists(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Write the report and return the path actually used
 */
export async function writeSnapshot(report: HarvestReport, options: SnapshotOptions): Promise<string> {
    await mkdir(options.dir, { recursive: true });

    const filename = options.filename ?? defaultSnapshotName(options.now);
    const { name, ext } = path.parse(filename);
    const contents = JSON.stringify(report, null, 2);

    for (let suffix = 0; suffix <= MAX_SUFFIX; suffix++) {
        const candidate = path.join(options.dir, suffix === 0 ? filename : `${name}-${suffix}${ext}`);
        try {
            await writeFile(candidate, contents, { encoding: 'utf-8', flag: 'wx' });
            return candidate;
        } catch (error) {
            if (!isAlreadyExists(error)) {
                throw error;
            }
        }
    }

    throw new Error(`No free snapshot name for ${filename} in ${options.dir}`);
}

const provenanceSchema = z.object({
    statusCode: z.number(),
    responseTimeMs: z.number(),
    capturedAt: z.string(),
});

const recordSchema = z.object({
    site: z.string(),
    title: z.string(),
    collections: z.object({ articles: z.array(z.string()) }).catchall(z.array(z.string())),
    fields: z.object({
        players: z.array(z.object({
            name: z.string(),
            age: z.number().nullable(),
            club: z.string(),
        })).optional(),
    }).catchall(z.unknown()),
    provenance: provenanceSchema,
});

const entrySchema = z.discriminatedUnion('status', [
    z.object({ status: z.literal('success'), record: recordSchema }),
    z.object({
        status: z.literal('fetch_failed'),
        url: z.string(),
        failure: z.string(),
        attempts: z.number(),
        elapsedMs: z.number(),
        statusCode: z.number().optional(),
    }),
    z.object({
        status: z.literal('extraction_failed'),
        sourceId: z.string(),
        failure: z.string(),
        provenance: provenanceSchema,
    }),
    z.object({
        status: z.literal('incomplete'),
        url: z.string(),
        reason: z.enum(['cancelled before dispatch', 'cancelled in flight']),
    }),
]);

const reportSchema = z.object({
    runId: z.string(),
    startedAt: z.string(),
    finishedAt: z.string(),
    complete: z.boolean(),
    entries: z.record(entrySchema),
    summary: z.object({
        total: z.number(),
        succeeded: z.number(),
        fetchFailed: z.number(),
        extractionFailed: z.number(),
        incomplete: z.number(),
    }),
});

/**
 * Read a snapshot back, validating its shape
 */
export async function readSnapshot(filePath: string): Promise<HarvestReport> {
    const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    return reportSchema.parse(raw);
}
