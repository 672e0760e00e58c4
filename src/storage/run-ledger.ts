import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { CollectionSummary, FieldConfig, RunRecord, RunStatus } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per collection run
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  field_id TEXT NOT NULL,
  field_name TEXT NOT NULL,
  started_at TEXT NOT NULL,
  finished_at TEXT,
  status TEXT NOT NULL DEFAULT 'running',
  scanned INTEGER NOT NULL DEFAULT 0,
  kept INTEGER NOT NULL DEFAULT 0,
  pages INTEGER NOT NULL DEFAULT 0,
  last_cursor TEXT,
  error TEXT,
  config_json TEXT NOT NULL DEFAULT '{}'
);

CREATE INDEX IF NOT EXISTS idx_runs_field ON runs(field_id);
`;

export type RunOutcome =
    | { status: Exclude<RunStatus, 'running' | 'failed'>; summary: CollectionSummary }
    | { status: 'failed'; error: string };

/**
 * Run history kept in SQLite (better-sqlite3).
 * Records when each run started and finished, how it ended, and how far it got.
 */
export class RunLedger {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.migrate();

        getLogger().debug({ dbPath }, 'Run ledger initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
        }
    }

    /**
     * Record the start of a run. Returns its run_id.
     */
    startRun(field: FieldConfig, config: unknown, startedAt: Date = new Date()): number {
        const result = this.db
            .prepare<{ field_id: string; field_name: string; started_at: string; config_json: string }>(`
      INSERT INTO runs (field_id, field_name, started_at, config_json)
      VALUES (@field_id, @field_name, @started_at, @config_json)
    `)
            .run({
                field_id: field.id,
                field_name: field.name,
                started_at: startedAt.toISOString(),
                config_json: JSON.stringify(config),
            });

        return Number(result.lastInsertRowid);
    }

    finishRun(runId: number, outcome: RunOutcome, finishedAt: Date = new Date()): void {
        const stmt = this.db.prepare<{
            run_id: number;
            finished_at: string;
            status: RunStatus;
            scanned: number | null;
            kept: number | null;
            pages: number | null;
            last_cursor: string | null;
            error: string | null;
        }>(`
      UPDATE runs SET
        finished_at = @finished_at,
        status = @status,
        scanned = COALESCE(@scanned, scanned),
        kept = COALESCE(@kept, kept),
        pages = COALESCE(@pages, pages),
        last_cursor = COALESCE(@last_cursor, last_cursor),
        error = @error
      WHERE run_id = @run_id
    `);

        if (outcome.status === 'failed') {
            stmt.run({
                run_id: runId,
                finished_at: finishedAt.toISOString(),
                status: 'failed',
                scanned: null,
                kept: null,
                pages: null,
                last_cursor: null,
                error: outcome.error,
            });
            return;
        }

        const { summary } = outcome;
        stmt.run({
            run_id: runId,
            finished_at: finishedAt.toISOString(),
            status: outcome.status,
            scanned: summary.scanned,
            kept: summary.kept,
            pages: summary.pages,
            last_cursor: summary.lastCursor,
            error: null,
        });
    }

    getRun(runId: number): RunRecord | undefined {
        return this.db.prepare<[number], RunRecord>('SELECT * FROM runs WHERE run_id = ?').get(runId);
    }

    /**
     * Most recent runs first.
     */
    listRuns(limit = 20, fieldId?: string): RunRecord[] {
        if (fieldId) {
            return this.db
                .prepare<[string, number], RunRecord>('SELECT * FROM runs WHERE field_id = ? ORDER BY run_id DESC LIMIT ?')
                .all(fieldId, limit);
        }
        return this.db.prepare<[number], RunRecord>('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?').all(limit);
    }

    close(): void {
        this.db.close();
        getLogger().debug('Run ledger closed');
    }
}
