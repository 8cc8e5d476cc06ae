/**
 * In-process player store
 * Used for dry runs when no records API is configured.
 */
import { logger } from '../observability/logger.js';
import type { PlayerRow, PlayerStore, TableStats } from './types.js';

export class MemoryPlayerStore implements PlayerStore {
    private readonly rows: PlayerRow[] = [];

    async bulkInsert(rows: PlayerRow[]): Promise<void> {
        this.rows.push(...rows.map(row => ({ ...row })));
        logger.debug('Stored player rows in memory', { count: rows.length, total: this.rows.length });
    }

    async getTableStats(): Promise<TableStats> {
        return {
            countries: 0,
            competitions: 0,
            clubs: new Set(this.rows.map(row => row.club)).size,
            players: this.rows.length,
            matches: 0,
        };
    }

    all(): readonly PlayerRow[] {
        return this.rows;
    }
}
