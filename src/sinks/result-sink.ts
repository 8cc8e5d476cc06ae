/**
 * Result Sink
 * Writes the report snapshot and forwards valid player rows to the store.
 * Failures are logged and returned; persist() never throws.
 */
import { z } from 'zod';
import { createLogger, logger } from '../observability/logger.js';
import { playerRowsTotal } from '../observability/metrics.js';
import { PersistenceError, errorSummary } from '../harvest/errors.js';
import { writeSnapshot } from './snapshot.js';
import type { HarvestReport, PlayerCandidate } from '../harvest/types.js';
import type { PlayerRow, PlayerStore, TableStats } from '../records/types.js';

export const playerRowSchema = z.object({
    name: z.string().trim().min(1, 'name must be a non-empty string'),
    age: z.number({ invalid_type_error: 'age must be a number' })
        .int('age must be an integer')
        .positive('age must be positive'),
    club: z.string().trim().min(1, 'club must be a non-empty string'),
});

export interface ResultSinkOptions {
    store: PlayerStore;
    resultsDir: string;
}

export interface PersistResult {
    snapshotPath: string | null;
    inserted: number;
    dropped: number;
    errors: PersistenceError[];
}

export class ResultSink {
    private readonly store: PlayerStore;
    private readonly resultsDir: string;

    constructor(options: ResultSinkOptions) {
        this.store = options.store;
        this.resultsDir = options.resultsDir;
    }

    async persist(report: HarvestReport, filename?: string): Promise<PersistResult> {
        const sinkLogger = createLogger({ runId: report.runId, stage: 'persist' });
        const errors: PersistenceError[] = [];
        let snapshotPath: string | null = null;

        try {
            snapshotPath = await writeSnapshot(report, { dir: this.resultsDir, filename });
            sinkLogger.info('Results saved', { path: snapshotPath });
        } catch (error) {
            const failure = new PersistenceError('snapshot', `Snapshot write failed: ${errorSummary(error)}`, { cause: error });
            sinkLogger.error('Error saving results', failure);
            errors.push(failure);
        }

        const { rows, dropped } = this.collectRows(report, sinkLogger);
        let inserted = 0;

        if (rows.length > 0) {
            try {
                await this.store.bulkInsert(rows);
                inserted = rows.length;
                playerRowsTotal.inc({ result: 'forwarded' }, rows.length);
            } catch (error) {
                const failure = new PersistenceError('bulk_insert', `Bulk insert failed: ${errorSummary(error)}`, { cause: error });
                sinkLogger.error('Error forwarding player rows', failure, { count: rows.length });
                errors.push(failure);
            }
        }

        return { snapshotPath, inserted, dropped, errors };
    }

    /**
     * Table counts from the store, or null when it cannot be reached
     */
    async tableStats(): Promise<TableStats | null> {
        try {
            return await this.store.getTableStats();
        } catch (error) {
            logger.warn('Table stats unavailable', { error: errorSummary(error) });
            return null;
        }
    }

    private collectRows(
        report: HarvestReport,
        sinkLogger: ReturnType<typeof createLogger>
    ): { rows: PlayerRow[]; dropped: number } {
        const rows: PlayerRow[] = [];
        let dropped = 0;

        for (const [sourceId, entry] of Object.entries(report.entries)) {
            if (entry.status !== 'success') {
                continue;
            }

            for (const candidate of entry.record.fields.players ?? []) {
                const result = validatePlayer(candidate);
                if (result.ok) {
                    rows.push(result.row);
                } else {
                    dropped++;
                    playerRowsTotal.inc({ result: 'dropped' });
                    sinkLogger.warn('Dropping invalid player row', {
                        sourceId,
                        player: candidate,
                        reason: result.reason,
                    });
                }
            }
        }

        return { rows, dropped };
    }
}

export function validatePlayer(candidate: PlayerCandidate): { ok: true; row: PlayerRow } | { ok: false; reason: string } {
    const result = playerRowSchema.safeParse(candidate);
    if (!result.success) {
        return { ok: false, reason: result.error.issues.map(issue => issue.message).join('; ') };
    }
    return { ok: true, row: result.data };
}
