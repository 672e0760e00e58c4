import { z } from 'zod';
import type {
    AuthorCatalog,
    AuthorPage,
    CatalogOptions,
    ConceptPage,
    EntityCandidate,
} from '../types/index.js';
import type { QueryParams, RateLimitedClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { bareId, toTopicScore } from './utils.js';

export const OPENALEX_BASE = 'https://api.openalex.org';

const AUTHOR_FIELDS = 'id,display_name,orcid,last_known_institutions,works_count,cited_by_count,x_concepts';

const CONCEPT_PAGE_SIZE = 200;

/**
 * OpenAlex API response schemas (subset of relevant fields).
 */
const MetaSchema = z.object({
    count: z.number().nullish(),
    next_cursor: z.string().nullish(),
});

const ConceptRefSchema = z.object({
    id: z.string().nullish(),
    display_name: z.string().nullish(),
    score: z.number().nullish(),
});

const InstitutionSchema = z.object({
    id: z.string().nullish(),
    display_name: z.string().nullish(),
    country_code: z.string().nullish(),
});

const AuthorSchema = z.object({
    id: z.string(),
    display_name: z.string().nullish(),
    orcid: z.string().nullish(),
    last_known_institutions: z.array(InstitutionSchema).nullish(),
    works_count: z.number().nullish(),
    cited_by_count: z.number().nullish(),
    x_concepts: z.array(ConceptRefSchema).nullish(),
});

const AuthorPageSchema = z.object({
    meta: MetaSchema.default({}),
    results: z.array(AuthorSchema).default([]),
});

const ConceptPageSchema = z.object({
    meta: MetaSchema.default({}),
    results: z.array(z.object({ id: z.string() })).default([]),
});

const CountSchema = z.object({
    meta: z.object({ count: z.number() }),
});

type OpenAlexAuthor = z.infer<typeof AuthorSchema>;

/**
 * OpenAlex author catalog.
 *
 * Three read-only surfaces: authors by concept (cursor-paged, field-selected),
 * concepts by ancestor (cursor-paged, ids only), and works counts via `per-page=1`.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexCatalog implements AuthorCatalog {
    private readonly perPage: number;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly timeouts: { authors: number; concepts: number; works: number };

    constructor(
        private readonly client: RateLimitedClient,
        options: CatalogOptions = {}
    ) {
        this.perPage = Math.min(options.perPage ?? 200, 200);
        this.apiKey = options.apiKey;
        this.email = options.email;
        this.timeouts = {
            authors: options.timeouts?.authors ?? 20,
            concepts: options.timeouts?.concepts ?? 20,
            works: options.timeouts?.works ?? 25,
        };
    }

    async fetchAuthorPage(conceptId: string, cursor: string): Promise<AuthorPage> {
        const params = this.withAuth({
            filter: `x_concepts.id:${bareId(conceptId)}`,
            'per-page': this.perPage,
            cursor,
            select: AUTHOR_FIELDS,
        });

        getLogger().debug({ conceptId, cursor }, 'OpenAlex author page');

        const data = await this.client.get('/authors', params, AuthorPageSchema, {
            timeoutSeconds: this.timeouts.authors,
            paced: true,
        });

        return {
            total: data.meta.count ?? null,
            nextCursor: data.meta.next_cursor || null,
            results: data.results.map((author) => this.normalizeAuthor(author)),
        };
    }

    async fetchDescendantPage(rootId: string, cursor: string): Promise<ConceptPage> {
        const params = this.withAuth({
            filter: `ancestors.id:${bareId(rootId)}`,
            'per-page': CONCEPT_PAGE_SIZE,
            cursor,
            select: 'id',
        });

        const data = await this.client.get('/concepts', params, ConceptPageSchema, {
            timeoutSeconds: this.timeouts.concepts,
        });

        return {
            ids: data.results.map((concept) => bareId(concept.id)).filter((id) => id.length > 0),
            nextCursor: data.meta.next_cursor || null,
        };
    }

    async countWorks(filter: string): Promise<number> {
        const params = this.withAuth({
            filter,
            'per-page': 1,
            select: 'id',
        });

        const data = await this.client.get('/works', params, CountSchema, {
            timeoutSeconds: this.timeouts.works,
        });
        return data.meta.count;
    }

    // ─── Private helpers ──────────────────────────────────────

    private normalizeAuthor(author: OpenAlexAuthor): EntityCandidate {
        return {
            id: author.id,
            displayName: author.display_name ?? '',
            orcid: author.orcid ?? null,
            institutions: (author.last_known_institutions ?? []).map((inst) => ({
                id: inst.id ?? '',
                displayName: inst.display_name ?? '',
                countryCode: inst.country_code ?? null,
            })),
            worksCount: author.works_count ?? 0,
            citedByCount: author.cited_by_count ?? 0,
            topics: (author.x_concepts ?? []).map(toTopicScore),
        };
    }

    private withAuth(params: QueryParams): QueryParams {
        return {
            ...params,
            api_key: this.apiKey,
            mailto: this.email,
        };
    }
}
