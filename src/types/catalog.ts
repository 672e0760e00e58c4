import type { EntityCandidate } from './author.js';

/**
 * Cursor value that starts a paginated sequence.
 */
export const START_CURSOR = '*';

export interface AuthorPage {
    /** Total authors matching the page filter, as reported by the catalog */
    total: number | null;
    nextCursor: string | null;
    results: EntityCandidate[];
}

export interface ConceptPage {
    /** Bare concept ids */
    ids: string[];
    nextCursor: string | null;
}

/**
 * Read-only query surfaces of the author catalog.
 * The OpenAlex adapter is the production implementation; tests supply fakes.
 */
export interface AuthorCatalog {
    /**
     * Fetch one page of authors tagged (directly or through a descendant) with the concept.
     */
    fetchAuthorPage(conceptId: string, cursor: string): Promise<AuthorPage>;

    /**
     * Fetch one page of concept ids whose ancestors include `rootId`.
     */
    fetchDescendantPage(rootId: string, cursor: string): Promise<ConceptPage>;

    /**
     * Number of works matching a filter expression. Rejects on request failure.
     */
    countWorks(filter: string): Promise<number>;
}

/**
 * Options for catalog adapter initialization.
 */
export interface CatalogOptions {
    /** Authors per page (max 200 on OpenAlex) */
    perPage?: number;

    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;

    timeouts?: {
        authors?: number;
        concepts?: number;
        works?: number;
    };
}
