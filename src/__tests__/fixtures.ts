import {
    START_CURSOR,
    type AuthorCatalog,
    type AuthorPage,
    type AuthorRecord,
    type ConceptPage,
    type EntityCandidate,
    type TopicScore,
} from '../types/index.js';
import type { CheckpointStore } from '../storage/checkpoint.js';
import type { RecordSink } from '../storage/csv-sink.js';

export function topic(id: string, score: number, displayName = `Concept ${id}`): TopicScore {
    return { id, displayName, score };
}

export function candidate(overrides: Partial<EntityCandidate> = {}): EntityCandidate {
    return {
        id: 'https://openalex.org/A100',
        displayName: 'Ada Example',
        orcid: null,
        institutions: [],
        worksCount: 10,
        citedByCount: 50,
        topics: [],
        ...overrides,
    };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

/**
 * In-memory catalog keyed by cursor.
 */
export class FakeCatalog implements AuthorCatalog {
    readonly authorCalls: Array<{ conceptId: string; cursor: string }> = [];
    readonly descendantCalls: Array<{ rootId: string; cursor: string }> = [];
    readonly countCalls: string[] = [];

    constructor(
        private readonly authorPages: Record<string, AuthorPage> = {},
        private readonly conceptPages: Record<string, ConceptPage> = {},
        private readonly counts: Record<string, number> = {}
    ) {}

    async fetchAuthorPage(conceptId: string, cursor: string): Promise<AuthorPage> {
        this.authorCalls.push({ conceptId, cursor });
        const page = this.authorPages[cursor];
        if (!page) throw new Error(`No author page for cursor ${cursor}`);
        return page;
    }

    async fetchDescendantPage(rootId: string, cursor: string): Promise<ConceptPage> {
        this.descendantCalls.push({ rootId, cursor });
        const page = this.conceptPages[cursor];
        if (!page) throw new Error(`No concept page for cursor ${cursor}`);
        return page;
    }

    async countWorks(filter: string): Promise<number> {
        this.countCalls.push(filter);
        const count = this.counts[filter];
        if (count === undefined) throw new Error(`No count for ${filter}`);
        return count;
    }
}

export class MemorySink implements RecordSink<AuthorRecord> {
    readonly pending: AuthorRecord[] = [];
    readonly persisted: AuthorRecord[] = [];
    opened = false;
    closed = false;
    flushes = 0;

    open(): void {
        this.opened = true;
    }

    write(record: AuthorRecord): void {
        this.pending.push(record);
    }

    flush(): void {
        this.flushes += 1;
        this.persisted.push(...this.pending.splice(0));
    }

    close(): void {
        if (this.opened) this.flush();
        this.closed = true;
    }
}

export class MemoryCheckpoint implements CheckpointStore {
    readonly saves: string[] = [];

    constructor(private cursor: string | null = null) {}

    save(cursor: string | null | undefined): void {
        if (!cursor) return;
        this.cursor = cursor;
        this.saves.push(cursor);
    }

    load(): string {
        return this.cursor || START_CURSOR;
    }

    clear(): void {
        this.cursor = null;
    }
}
