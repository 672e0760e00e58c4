import {
    START_CURSOR,
    type AuthorCatalog,
    type AuthorRecord,
    type CollectionSummary,
    type EntityCandidate,
    type FieldConfig,
    type FilterDecision,
    type MembershipSet,
    type RejectReason,
    type StopReason,
} from '../types/index.js';
import type { CheckpointStore } from '../storage/checkpoint.js';
import { toAuthorRecord, type RecordSink } from '../storage/csv-sink.js';
import type { PaceState } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export type CollectorState = 'idle' | 'preloading' | 'running' | 'draining' | 'stopped';

export interface CollectorDeps {
    catalog: AuthorCatalog;
    preloader: { loadDescendants(rootId: string): Promise<MembershipSet> };
    filter: { evaluate(candidate: EntityCandidate, membership: MembershipSet): Promise<FilterDecision> };
    checkpoint: CheckpointStore;
    sink: RecordSink<AuthorRecord>;
}

export interface CollectorOptions {
    field: FieldConfig;
    /** Flush the sink every N pages */
    flushEveryPages: number;
    /** Polled once per page, after the page's cursor is saved */
    signal?: AbortSignal;
    /** Live pacing, reported in progress logs */
    pace?: Readonly<PaceState>;
}

function emptyRejections(): Record<RejectReason, number> {
    return {
        'no-topics': 0,
        'outside-top-k': 0,
        'below-absolute-floor': 0,
        'below-relative-strength': 0,
        'insufficient-field-share': 0,
    };
}

/**
 * Drives one collection run:
 *
 * 1. PRELOADING: build the concept membership set (failure aborts the run)
 * 2. RUNNING: page through authors from the saved cursor, filter, write, checkpoint
 * 3. DRAINING: entered on an empty page, a missing next cursor, or cancellation
 * 4. STOPPED: the sink is closed, whatever happened
 *
 * Cancellation is only observed between pages, so a page is always
 * processed completely and its cursor saved before the loop stops.
 */
export class AuthorCollector {
    private current: CollectorState = 'idle';

    constructor(
        private readonly deps: CollectorDeps,
        private readonly options: CollectorOptions
    ) {}

    get state(): CollectorState {
        return this.current;
    }

    async run(): Promise<CollectionSummary> {
        if (this.current !== 'idle') {
            throw new Error(`Collector cannot run from state "${this.current}"`);
        }

        const { catalog, preloader, filter, checkpoint, sink } = this.deps;
        const { field, flushEveryPages, signal, pace } = this.options;
        const logger = getLogger();

        const rejections = emptyRejections();
        let scanned = 0;
        let kept = 0;
        let pages = 0;
        let totalAvailable: number | null = null;
        let stopReason: StopReason = 'exhausted';
        let lastCursor: string | null = null;

        try {
            this.transition('preloading');
            const membership = await preloader.loadDescendants(field.id);

            let cursor = checkpoint.load();
            if (cursor !== START_CURSOR) {
                logger.info({ cursor }, 'Resuming from saved cursor');
            }
            lastCursor = cursor;

            sink.open();
            this.transition('running');

            for (;;) {
                const page = await catalog.fetchAuthorPage(field.id, cursor);

                if (pages === 0 && totalAvailable === null && page.total !== null) {
                    totalAvailable = page.total;
                    logger.info({ total: totalAvailable }, 'Total candidates available');
                }

                if (page.results.length === 0) {
                    lastCursor = null;
                    break;
                }

                pages += 1;
                let keptThisPage = 0;
                for (const candidate of page.results) {
                    const decision = await filter.evaluate(candidate, membership);
                    if (!decision.accepted) {
                        rejections[decision.reason] += 1;
                        continue;
                    }
                    sink.write(toAuthorRecord(candidate, decision, field.name));
                    keptThisPage += 1;
                }

                scanned += page.results.length;
                kept += keptThisPage;
                logger.info(
                    {
                        scanned,
                        kept,
                        keptThisPage,
                        sleepSeconds: pace ? Number(pace.sleepSeconds.toFixed(2)) : undefined,
                    },
                    'Page processed'
                );

                checkpoint.save(page.nextCursor);
                lastCursor = page.nextCursor;
                if (!page.nextCursor) break;
                cursor = page.nextCursor;

                if (pages % flushEveryPages === 0) {
                    sink.flush();
                }

                if (signal?.aborted) {
                    stopReason = 'interrupted';
                    logger.warn({ cursor }, 'Graceful stop, checkpoint saved');
                    break;
                }
            }

            if (stopReason === 'exhausted') {
                // a finished crawl starts over next time instead of replaying its last page
                checkpoint.clear();
            }

            this.transition('draining');
            return { stopReason, scanned, kept, pages, lastCursor, totalAvailable, rejections };
        } finally {
            sink.close();
            this.transition('stopped');
        }
    }

    private transition(next: CollectorState): void {
        getLogger().debug({ from: this.current, to: next }, 'Collector state');
        this.current = next;
    }
}
