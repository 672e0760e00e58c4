import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RunLedger } from '../storage/run-ledger.js';
import type { CollectionSummary } from '../types/index.js';

const FIELD = { id: 'C162324750', name: 'Economics' };

function summary(overrides: Partial<CollectionSummary> = {}): CollectionSummary {
    return {
        stopReason: 'exhausted',
        scanned: 400,
        kept: 37,
        pages: 2,
        lastCursor: null,
        totalAvailable: 400,
        rejections: {
            'no-topics': 1,
            'outside-top-k': 300,
            'below-absolute-floor': 40,
            'below-relative-strength': 20,
            'insufficient-field-share': 2,
        },
        ...overrides,
    };
}

describe('RunLedger', () => {
    let ledger: RunLedger;

    beforeEach(() => {
        ledger = new RunLedger(':memory:');
    });

    afterEach(() => {
        ledger.close();
    });

    it('should record a started run', () => {
        const runId = ledger.startRun(FIELD, { filter: { topK: 5 } }, new Date('2026-01-02T03:04:05.000Z'));

        expect(ledger.getRun(runId)).toEqual({
            run_id: runId,
            field_id: 'C162324750',
            field_name: 'Economics',
            started_at: '2026-01-02T03:04:05.000Z',
            finished_at: null,
            status: 'running',
            scanned: 0,
            kept: 0,
            pages: 0,
            last_cursor: null,
            error: null,
            config_json: '{"filter":{"topK":5}}',
        });
    });

    it('should record a completed run with its counters', () => {
        const runId = ledger.startRun(FIELD, {});
        ledger.finishRun(runId, { status: 'completed', summary: summary() }, new Date('2026-01-02T04:00:00.000Z'));

        expect(ledger.getRun(runId)).toMatchObject({
            status: 'completed',
            finished_at: '2026-01-02T04:00:00.000Z',
            scanned: 400,
            kept: 37,
            pages: 2,
            last_cursor: null,
            error: null,
        });
    });

    it('should keep the resume cursor of an interrupted run', () => {
        const runId = ledger.startRun(FIELD, {});
        ledger.finishRun(runId, {
            status: 'interrupted',
            summary: summary({ stopReason: 'interrupted', lastCursor: 'next-3' }),
        });

        expect(ledger.getRun(runId)).toMatchObject({ status: 'interrupted', last_cursor: 'next-3' });
    });

    it('should record the error of a failed run', () => {
        const runId = ledger.startRun(FIELD, {});
        ledger.finishRun(runId, { status: 'failed', error: 'HTTP 400: Bad Request' });

        expect(ledger.getRun(runId)).toMatchObject({
            status: 'failed',
            scanned: 0,
            error: 'HTTP 400: Bad Request',
        });
    });

    it('should return undefined for an unknown run', () => {
        expect(ledger.getRun(999)).toBeUndefined();
    });

    it('should list recent runs newest first, optionally by field', () => {
        const first = ledger.startRun(FIELD, {});
        const second = ledger.startRun({ id: 'C41008148', name: 'Computer science' }, {});
        const third = ledger.startRun(FIELD, {});

        expect(ledger.listRuns().map((run) => run.run_id)).toEqual([third, second, first]);
        expect(ledger.listRuns(2).map((run) => run.run_id)).toEqual([third, second]);
        expect(ledger.listRuns(20, 'C162324750').map((run) => run.run_id)).toEqual([third, first]);
    });

    it('should create the database file and its directory on disk', () => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fieldscout-ledger-'));
        const dbPath = path.join(tmpDir, 'nested', 'fieldscout.db');

        try {
            const onDisk = new RunLedger(dbPath);
            const runId = onDisk.startRun(FIELD, {});
            onDisk.close();

            const reopened = new RunLedger(dbPath);
            expect(reopened.getRun(runId)?.field_name).toBe('Economics');
            reopened.close();
        } finally {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        }
    });
});
