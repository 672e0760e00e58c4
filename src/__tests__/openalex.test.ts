import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { OpenAlexCatalog } from '../sources/openalex.js';
import { bareId, safeName, toTopicScore } from '../sources/utils.js';
import { createPaceState, RateLimitedClient } from '../utils/http-client.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { jsonResponse } from './fixtures.js';

describe('bareId', () => {
    it('should strip the URL prefix', () => {
        expect(bareId('https://openalex.org/C162324750')).toBe('C162324750');
    });

    it('should leave bare ids alone', () => {
        expect(bareId('C162324750')).toBe('C162324750');
    });

    it('should ignore trailing slashes', () => {
        expect(bareId('https://openalex.org/A5023888391/')).toBe('A5023888391');
    });

    it('should return empty string for missing ids', () => {
        expect(bareId(null)).toBe('');
        expect(bareId(undefined)).toBe('');
        expect(bareId('')).toBe('');
    });
});

describe('toTopicScore', () => {
    it('should normalize a concept tag', () => {
        expect(
            toTopicScore({ id: 'https://openalex.org/C1', display_name: 'Economics', score: 71.5 })
        ).toEqual({ id: 'C1', displayName: 'Economics', score: 71.5 });
    });

    it('should default missing fields', () => {
        expect(toTopicScore({})).toEqual({ id: '', displayName: '', score: 0 });
        expect(toTopicScore({ id: 'C2', score: null })).toEqual({ id: 'C2', displayName: '', score: 0 });
    });
});

describe('safeName', () => {
    it('should lowercase and replace separators', () => {
        expect(safeName('Environmental Science')).toBe('environmental_science');
        expect(safeName('  Law & Economics ')).toBe('law_economics');
    });

    it('should fall back when nothing is left', () => {
        expect(safeName('***')).toBe('field');
    });
});

describe('OpenAlexCatalog', () => {
    let fetchMock: Mock<typeof fetch>;

    function makeCatalog(options: { apiKey?: string; email?: string; perPage?: number } = {}): OpenAlexCatalog {
        const client = new RateLimitedClient({
            baseUrl: 'https://api.openalex.org',
            pace: createPaceState(DEFAULT_CONFIG.pacing),
            sleep: async () => undefined,
        });
        return new OpenAlexCatalog(client, options);
    }

    function requestedUrl(call = 0): URL {
        return new URL(String(fetchMock.mock.calls[call]?.[0]));
    }

    beforeEach(() => {
        fetchMock = vi.fn<typeof fetch>();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('fetchAuthorPage', () => {
        it('should request authors tagged with the concept', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ meta: { count: 0, next_cursor: null }, results: [] }));

            await makeCatalog({ perPage: 50 }).fetchAuthorPage('https://openalex.org/C162324750', '*');

            const url = requestedUrl();
            expect(url.pathname).toBe('/authors');
            expect(url.searchParams.get('filter')).toBe('x_concepts.id:C162324750');
            expect(url.searchParams.get('per-page')).toBe('50');
            expect(url.searchParams.get('cursor')).toBe('*');
            expect(url.searchParams.get('select')).toBe(
                'id,display_name,orcid,last_known_institutions,works_count,cited_by_count,x_concepts'
            );
            expect(url.searchParams.has('api_key')).toBe(false);
        });

        it('should cap the page size at 200', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ meta: {}, results: [] }));

            await makeCatalog({ perPage: 500 }).fetchAuthorPage('C1', '*');

            expect(requestedUrl().searchParams.get('per-page')).toBe('200');
        });

        it('should pass credentials when configured', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ meta: {}, results: [] }));

            await makeCatalog({ apiKey: 'test-key', email: 'test@example.org' }).fetchAuthorPage('C1', 'abc');

            const url = requestedUrl();
            expect(url.searchParams.get('api_key')).toBe('test-key');
            expect(url.searchParams.get('mailto')).toBe('test@example.org');
        });

        it('should normalize authors and the page metadata', async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse({
                    meta: { count: 1234, next_cursor: 'next-1' },
                    results: [
                        {
                            id: 'https://openalex.org/A1',
                            display_name: 'Grace Example',
                            orcid: 'https://orcid.org/0000-0000-0000-0001',
                            last_known_institutions: [
                                { id: 'https://openalex.org/I9', display_name: 'Example University', country_code: 'NZ' },
                            ],
                            works_count: 40,
                            cited_by_count: 900,
                            x_concepts: [
                                { id: 'https://openalex.org/C1', display_name: 'Economics', score: 80.2 },
                                { id: 'https://openalex.org/C2', display_name: 'Finance' },
                            ],
                        },
                        { id: 'https://openalex.org/A2' },
                    ],
                })
            );

            const page = await makeCatalog().fetchAuthorPage('C1', '*');

            expect(page.total).toBe(1234);
            expect(page.nextCursor).toBe('next-1');
            expect(page.results[0]).toEqual({
                id: 'https://openalex.org/A1',
                displayName: 'Grace Example',
                orcid: 'https://orcid.org/0000-0000-0000-0001',
                institutions: [
                    { id: 'https://openalex.org/I9', displayName: 'Example University', countryCode: 'NZ' },
                ],
                worksCount: 40,
                citedByCount: 900,
                topics: [
                    { id: 'C1', displayName: 'Economics', score: 80.2 },
                    { id: 'C2', displayName: 'Finance', score: 0 },
                ],
            });
            expect(page.results[1]).toEqual({
                id: 'https://openalex.org/A2',
                displayName: '',
                orcid: null,
                institutions: [],
                worksCount: 0,
                citedByCount: 0,
                topics: [],
            });
        });

        it('should treat an empty next cursor as the end', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ meta: { next_cursor: '' }, results: [] }));

            const page = await makeCatalog().fetchAuthorPage('C1', '*');

            expect(page.nextCursor).toBeNull();
            expect(page.total).toBeNull();
        });
    });

    describe('fetchDescendantPage', () => {
        it('should request concepts by ancestor and return bare ids', async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse({
                    meta: { next_cursor: 'c2' },
                    results: [{ id: 'https://openalex.org/C10' }, { id: 'https://openalex.org/C11' }],
                })
            );

            const page = await makeCatalog().fetchDescendantPage('https://openalex.org/C1', '*');

            const url = requestedUrl();
            expect(url.pathname).toBe('/concepts');
            expect(url.searchParams.get('filter')).toBe('ancestors.id:C1');
            expect(url.searchParams.get('per-page')).toBe('200');
            expect(url.searchParams.get('select')).toBe('id');
            expect(page).toEqual({ ids: ['C10', 'C11'], nextCursor: 'c2' });
        });
    });

    describe('countWorks', () => {
        it('should read meta.count from a one-result query', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ meta: { count: 57 }, results: [{ id: 'W1' }] }));

            const count = await makeCatalog().countWorks('authorships.author.id:A1');

            const url = requestedUrl();
            expect(url.pathname).toBe('/works');
            expect(url.searchParams.get('filter')).toBe('authorships.author.id:A1');
            expect(url.searchParams.get('per-page')).toBe('1');
            expect(count).toBe(57);
        });

        it('should fail when the count is missing', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ meta: {}, results: [] }));

            await expect(makeCatalog().countWorks('x')).rejects.toMatchObject({ name: 'HttpError' });
        });
    });
});
