/**
 * Barrel export for all shared types.
 */
export { AUTHOR_COLUMNS, REJECT_REASONS } from './author.js';
export type {
    TopicScore,
    Institution,
    EntityCandidate,
    MembershipSet,
    RejectReason,
    RejectedDecision,
    AcceptedDecision,
    FilterDecision,
    AuthorColumn,
    AuthorRecord,
    CellValue,
} from './author.js';
export { START_CURSOR } from './catalog.js';
export type { AuthorCatalog, AuthorPage, ConceptPage, CatalogOptions } from './catalog.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    FieldScoutConfig,
    LogLevel,
    FieldConfig,
    PagingConfig,
    PacingConfig,
    TimeoutConfig,
    CourtesyConfig,
    FilterConfig,
    OutputConfig,
} from './config.js';
export type { RunStatus, StopReason, CollectionSummary, RunRecord } from './run.js';
