import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { START_CURSOR } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Single-slot persistence of the next-page cursor.
 */
export interface CheckpointStore {
    /** Persist `cursor`; empty or absent cursors are ignored */
    save(cursor: string | null | undefined): void;
    /** The last saved cursor, or "*" when there is none */
    load(): string;
    clear(): void;
}

/**
 * Cursor checkpoint kept as a plain text file.
 *
 * Exhaustion is never written: a natural finish clears the file, so the next
 * run starts from "*".
 */
export class FileCheckpointStore implements CheckpointStore {
    constructor(private readonly filePath: string) {}

    save(cursor: string | null | undefined): void {
        if (!cursor) return;

        mkdirSync(dirname(this.filePath), { recursive: true });
        writeFileSync(this.filePath, cursor, 'utf-8');
    }

    load(): string {
        if (!existsSync(this.filePath)) return START_CURSOR;

        const saved = readFileSync(this.filePath, 'utf-8').trim();
        return saved || START_CURSOR;
    }

    clear(): void {
        rmSync(this.filePath, { force: true });
        getLogger().debug({ path: this.filePath }, 'Checkpoint cleared');
    }

    exists(): boolean {
        return this.load() !== START_CURSOR;
    }

    get path(): string {
        return this.filePath;
    }
}
