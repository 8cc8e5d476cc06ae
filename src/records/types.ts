/**
 * Persistence collaborator contract
 */

/**
 * Required-field contract of the players table
 */
export interface PlayerRow {
    name: string;
    age: number;
    club: string;
}

export const STAT_TABLES = ['countries', 'competitions', 'clubs', 'players', 'matches'] as const;

export type StatTable = typeof STAT_TABLES[number];

/**
 * Row count per table, or 'error' when the count is unavailable
 */
export type TableStats = Record<StatTable, number | 'error'>;

export interface PlayerStore {
    bulkInsert(rows: PlayerRow[]): Promise<void>;
    getTableStats(): Promise<TableStats>;
}
