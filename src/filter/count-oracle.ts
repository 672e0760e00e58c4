import type { AuthorCatalog } from '../types/index.js';
import { bareId } from '../sources/utils.js';
import { sleep as defaultSleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export interface CountOracleOptions {
    /** Pause after each uncached lookup, in seconds */
    courtesyDelay?: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Works counts per author, memoized for the lifetime of the oracle.
 *
 * Counts are never invalidated. One oracle belongs to one collection run;
 * remote counts drift, so a cache must not outlive the run.
 */
export class CountOracle {
    private readonly cache = new Map<string, number>();
    private readonly courtesyDelay: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly catalog: AuthorCatalog,
        options: CountOracleOptions = {}
    ) {
        this.courtesyDelay = options.courtesyDelay ?? 0.1;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Works matching a filter expression. Any failure counts as 0.
     */
    async countMatching(filter: string): Promise<number> {
        try {
            return await this.catalog.countWorks(filter);
        } catch (error) {
            getLogger().warn({ filter, error }, 'Count query failed, treating as 0');
            return 0;
        }
    }

    async totalWorks(authorId: string): Promise<number> {
        const author = bareId(authorId);
        if (!author) return 0;

        return this.memoized(`total:${author}`, `authorships.author.id:${author}`);
    }

    async fieldWorks(authorId: string, rootId: string): Promise<number> {
        const author = bareId(authorId);
        const root = bareId(rootId);
        if (!author || !root) return 0;

        return this.memoized(`field:${author}:${root}`, `authorships.author.id:${author},concepts.id:${root}`);
    }

    /**
     * Whether at least `minShare` of the author's works are tagged with the root concept.
     * An author with no works fails.
     */
    async shareInField(authorId: string, rootId: string, minShare: number): Promise<boolean> {
        const total = await this.totalWorks(authorId);
        if (total <= 0) return false;

        const inField = await this.fieldWorks(authorId, rootId);
        return inField / total >= minShare;
    }

    /**
     * Number of cached counts.
     */
    get size(): number {
        return this.cache.size;
    }

    private async memoized(key: string, filter: string): Promise<number> {
        const cached = this.cache.get(key);
        if (cached !== undefined) return cached;

        const count = await this.countMatching(filter);
        this.cache.set(key, count);
        await this.sleep(this.courtesyDelay * 1000);
        return count;
    }
}
