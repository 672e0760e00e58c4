/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Target concept (field) whose subtree defines relevance.
 */
export interface FieldConfig {
    /** Concept id, bare (`C162324750`) or URL form */
    id: string;
    /** Human-readable label, written to the `field_group` column */
    name: string;
}

export interface PagingConfig {
    perPage: number;
    /** Flush the sink every N pages */
    flushEveryPages: number;
}

/**
 * Adaptive pacing between author pages. All values in seconds / plain multipliers.
 */
export interface PacingConfig {
    initialSleep: number;
    minSleep: number;
    maxSleep: number;
    backoffMultiplier: number;
    cooldownMultiplier: number;
    /** Attempts per request before giving up; 0 retries forever */
    maxAttempts: number;
}

/**
 * Request timeouts in seconds, per query surface.
 */
export interface TimeoutConfig {
    authors: number;
    concepts: number;
    works: number;
}

/**
 * Fixed delays (seconds) applied by the preloader between pages and by the
 * count oracle after each uncached lookup.
 */
export interface CourtesyConfig {
    preloadDelay: number;
    countDelay: number;
}

/**
 * Relevance filter thresholds. Scores are on the 0–100 scale.
 */
export interface FilterConfig {
    minAbsoluteScore: number;
    /** 0 disables the top-K gate */
    topK: number;
    /** null disables the relative-strength gate */
    relativeThreshold: number | null;
    borderlineThreshold: number;
    minShare: number;
    skipShareIfTopInField: boolean;
}

export interface OutputConfig {
    dir: string;
    csvPath?: string;
    cursorPath?: string;
    ledgerPath?: string;
}

/**
 * Full fieldscout configuration merged from CLI flags, env vars, and config file.
 */
export interface FieldScoutConfig {
    field: FieldConfig;
    paging: PagingConfig;
    pacing: PacingConfig;
    timeouts: TimeoutConfig;
    courtesy: CourtesyConfig;
    filter: FilterConfig;
    output: OutputConfig;

    /** Contact address for the OpenAlex polite pool */
    email?: string;
    apiKey?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values. The field has no default and must be supplied.
 */
export const DEFAULT_CONFIG: Omit<FieldScoutConfig, 'field'> = {
    paging: {
        perPage: 200,
        flushEveryPages: 5,
    },
    pacing: {
        initialSleep: 0.15,
        minSleep: 0.05,
        maxSleep: 1.25,
        backoffMultiplier: 1.5,
        cooldownMultiplier: 0.9,
        maxAttempts: 0,
    },
    timeouts: {
        authors: 20,
        concepts: 20,
        works: 25,
    },
    courtesy: {
        preloadDelay: 0.2,
        countDelay: 0.1,
    },
    filter: {
        minAbsoluteScore: 20,
        topK: 5,
        relativeThreshold: 0.6,
        borderlineThreshold: 45,
        minShare: 0.4,
        skipShareIfTopInField: true,
    },
    output: {
        dir: 'fieldscout_outputs',
    },
    logLevel: 'info',
    jsonLogs: false,
};
