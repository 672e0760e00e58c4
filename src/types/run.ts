import type { RejectReason } from './author.js';

export type RunStatus = 'running' | 'completed' | 'interrupted' | 'failed';

export type StopReason = 'exhausted' | 'interrupted';

/**
 * Outcome of one collection loop.
 */
export interface CollectionSummary {
    stopReason: StopReason;
    scanned: number;
    kept: number;
    pages: number;
    /** Cursor for the page after the last processed one; null once exhausted */
    lastCursor: string | null;
    /** Total candidates reported by the catalog on the first page */
    totalAvailable: number | null;
    rejections: Record<RejectReason, number>;
}

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id: number;
    field_id: string;
    field_name: string;
    started_at: string;
    finished_at: string | null;
    status: RunStatus;
    scanned: number;
    kept: number;
    pages: number;
    last_cursor: string | null;
    error: string | null;
    config_json: string;
}
