/**
 * A concept tag on an author, normalized from the catalog's `x_concepts` entries.
 */
export interface TopicScore {
    /** Bare concept id (e.g., "C162324750") */
    id: string;
    displayName: string;
    /** Association strength on the 0–100 scale; 0 when the catalog omits it */
    score: number;
}

export interface Institution {
    id: string;
    displayName: string;
    countryCode: string | null;
}

/**
 * One author as materialized from an author page. Consumed by the filter and
 * the sink mapping, never retained.
 */
export interface EntityCandidate {
    /** Catalog id as returned by the API (URL form) */
    id: string;
    displayName: string;
    orcid: string | null;
    /** Last known institutions, most recent first */
    institutions: Institution[];
    worksCount: number;
    citedByCount: number;
    /** Topics in the order the catalog returned them */
    topics: TopicScore[];
}

/**
 * Concept ids making up the target subtree (root plus all descendants).
 */
export type MembershipSet = ReadonlySet<string>;

export type RejectReason =
    | 'no-topics'
    | 'outside-top-k'
    | 'below-absolute-floor'
    | 'below-relative-strength'
    | 'insufficient-field-share';

export const REJECT_REASONS: readonly RejectReason[] = [
    'no-topics',
    'outside-top-k',
    'below-absolute-floor',
    'below-relative-strength',
    'insufficient-field-share',
];

export interface RejectedDecision {
    accepted: false;
    reason: RejectReason;
}

export interface AcceptedDecision {
    accepted: true;
    /** Highest-scored topic overall */
    topPrimary: TopicScore;
    /** Highest-scored in-field topic that cleared the absolute floor */
    bestInField: TopicScore;
    bestInFieldScore: number;
    isPrimaryInField: boolean;
}

export type FilterDecision = RejectedDecision | AcceptedDecision;

/**
 * CSV columns, in output order.
 */
export const AUTHOR_COLUMNS = [
    'author_id',
    'name',
    'orcid',
    'institution_id',
    'affiliation',
    'country',
    'works_count',
    'cited_by_count',
    'fields',
    'field_group',
    'primary_concept_id',
    'primary_concept_name',
    'primary_concept_score',
    'best_in_field_score',
    'best_in_field_id',
    'best_in_field_name',
    'is_primary_in_field',
] as const;

export type AuthorColumn = (typeof AUTHOR_COLUMNS)[number];

export type CellValue = string | number | boolean | null;

/**
 * One accepted author as written to the output sink.
 */
export type AuthorRecord = Record<AuthorColumn, CellValue>;
