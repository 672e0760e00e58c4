import { appendFileSync, existsSync, mkdirSync, statSync } from 'node:fs';
import { dirname } from 'node:path';
import {
    AUTHOR_COLUMNS,
    type AcceptedDecision,
    type AuthorRecord,
    type CellValue,
    type EntityCandidate,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Append-only destination for accepted records.
 */
export interface RecordSink<T> {
    open(): void;
    write(record: T): void;
    /** Persist everything written so far */
    flush(): void;
    /** Flush and release; safe to call more than once, or before `open()` */
    close(): void;
}

/**
 * Map an accepted author to its CSV row.
 */
export function toAuthorRecord(
    candidate: EntityCandidate,
    decision: AcceptedDecision,
    fieldName: string
): AuthorRecord {
    const institution = candidate.institutions[0];

    return {
        author_id: candidate.id,
        name: candidate.displayName,
        orcid: candidate.orcid,
        institution_id: institution?.id || 'N/A',
        affiliation: institution?.displayName || 'N/A',
        country: institution?.countryCode || 'N/A',
        works_count: candidate.worksCount,
        cited_by_count: candidate.citedByCount,
        fields: candidate.topics.map((topic) => topic.displayName).join('; '),
        field_group: fieldName,
        primary_concept_id: decision.topPrimary.id,
        primary_concept_name: decision.topPrimary.displayName,
        primary_concept_score: decision.topPrimary.score,
        best_in_field_score: decision.bestInFieldScore,
        best_in_field_id: decision.bestInField.id,
        best_in_field_name: decision.bestInField.displayName,
        is_primary_in_field: decision.isPrimaryInField,
    };
}

/**
 * Render one CSV cell. Quoted only when it contains a delimiter, quote, or newline.
 */
export function csvCell(value: CellValue): string {
    if (value === null) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvLine(values: readonly CellValue[]): string {
    return values.map(csvCell).join(',') + '\n';
}

/**
 * CSV file sink with a fixed column order.
 *
 * Rows are buffered in memory and appended on `flush()`; the header is written
 * only when the file is new or empty, so resumed runs keep appending.
 */
export class CsvSink implements RecordSink<AuthorRecord> {
    private buffer: string[] = [];
    private state: 'new' | 'open' | 'closed' = 'new';
    private written = 0;

    constructor(private readonly filePath: string) {}

    open(): void {
        if (this.state === 'open') return;
        if (this.state === 'closed') {
            throw new Error(`CSV sink already closed: ${this.filePath}`);
        }

        mkdirSync(dirname(this.filePath), { recursive: true });
        const isEmpty = !existsSync(this.filePath) || statSync(this.filePath).size === 0;
        if (isEmpty) {
            appendFileSync(this.filePath, csvLine(AUTHOR_COLUMNS), 'utf-8');
        }

        this.state = 'open';
        getLogger().debug({ path: this.filePath, header: isEmpty }, 'CSV sink opened');
    }

    write(record: AuthorRecord): void {
        if (this.state !== 'open') {
            throw new Error(`CSV sink is not open: ${this.filePath}`);
        }
        this.buffer.push(csvLine(AUTHOR_COLUMNS.map((column) => record[column])));
    }

    flush(): void {
        if (this.buffer.length === 0) return;

        appendFileSync(this.filePath, this.buffer.join(''), 'utf-8');
        this.written += this.buffer.length;
        this.buffer = [];
    }

    close(): void {
        if (this.state === 'open') {
            this.flush();
            getLogger().info({ path: this.filePath, rows: this.written }, 'CSV closed');
        }
        this.state = 'closed';
    }

    /**
     * Rows persisted to disk so far.
     */
    get rowsWritten(): number {
        return this.written;
    }
}
