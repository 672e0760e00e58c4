import { START_CURSOR, type AuthorCatalog, type MembershipSet } from '../types/index.js';
import { bareId } from '../sources/utils.js';
import { sleep as defaultSleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export interface PreloaderOptions {
    /** Fixed pause between concept pages, in seconds */
    pageDelay?: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Builds the membership set for a concept subtree once per run, so the filter
 * can test "is this concept in the field" without per-author requests.
 */
export class TaxonomyPreloader {
    private readonly pageDelay: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly catalog: AuthorCatalog,
        options: PreloaderOptions = {}
    ) {
        this.pageDelay = options.pageDelay ?? 0.2;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Collect the root id and every descendant id.
     * Errors propagate: a partial subtree is never returned.
     */
    async loadDescendants(rootId: string): Promise<MembershipSet> {
        const root = bareId(rootId);
        const ids = new Set<string>([root]);
        let cursor: string | null = START_CURSOR;
        let pages = 0;

        getLogger().info({ rootId: root }, 'Preloading concept subtree');

        while (cursor) {
            if (pages > 0) {
                await this.sleep(this.pageDelay * 1000);
            }

            const page = await this.catalog.fetchDescendantPage(root, cursor);
            pages += 1;

            if (page.ids.length === 0) break;
            for (const id of page.ids) {
                ids.add(id);
            }

            cursor = page.nextCursor;
        }

        getLogger().info({ rootId: root, concepts: ids.size, pages }, 'Concept subtree loaded');
        return ids;
    }
}
