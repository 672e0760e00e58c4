import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type CourtesyConfig,
    type FieldConfig,
    type FieldScoutConfig,
    type FilterConfig,
    type LogLevel,
    type OutputConfig,
    type PacingConfig,
    type PagingConfig,
    type TimeoutConfig,
} from '../types/index.js';
import { getLogger } from './logger.js';

const BaseConfigSchema = z.object({
    field: z.object({
        id: z.string().trim().min(1, 'field id is required'),
        name: z.string().trim().min(1, 'field name is required'),
    }),
    paging: z.object({
        perPage: z.number().int().min(1).max(200),
        flushEveryPages: z.number().int().min(1),
    }),
    pacing: z.object({
        initialSleep: z.number().min(0),
        minSleep: z.number().min(0),
        maxSleep: z.number().min(0),
        backoffMultiplier: z.number().min(1),
        cooldownMultiplier: z.number().gt(0).max(1),
        maxAttempts: z.number().int().min(0),
    }),
    timeouts: z.object({
        authors: z.number().positive(),
        concepts: z.number().positive(),
        works: z.number().positive(),
    }),
    courtesy: z.object({
        preloadDelay: z.number().min(0),
        countDelay: z.number().min(0),
    }),
    filter: z.object({
        minAbsoluteScore: z.number().min(0).max(100),
        topK: z.number().int().min(0),
        relativeThreshold: z.number().min(0).nullable(),
        borderlineThreshold: z.number().min(0).max(100),
        minShare: z.number().min(0).max(1),
        skipShareIfTopInField: z.boolean(),
    }),
    output: z.object({
        dir: z.string().min(1),
        csvPath: z.string().min(1).optional(),
        cursorPath: z.string().min(1).optional(),
        ledgerPath: z.string().min(1).optional(),
    }),
    email: z.string().email().optional(),
    apiKey: z.string().min(1).optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    jsonLogs: z.boolean(),
});

const ConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
    if (config.pacing.minSleep > config.pacing.maxSleep) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['pacing', 'minSleep'],
            message: 'must not exceed pacing.maxSleep',
        });
    }
});

const FileConfigSchema = BaseConfigSchema.deepPartial();

/**
 * Configuration overrides from one source (file, environment, or CLI flags).
 * Every value is optional; nested sections merge key by key.
 */
export interface ConfigOverrides {
    field?: Partial<FieldConfig>;
    paging?: Partial<PagingConfig>;
    pacing?: Partial<PacingConfig>;
    timeouts?: Partial<TimeoutConfig>;
    courtesy?: Partial<CourtesyConfig>;
    filter?: Partial<FilterConfig>;
    output?: Partial<OutputConfig>;
    email?: string;
    apiKey?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Invalid configuration, with every problem listed.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'ConfigError';
    }
}

export interface ResolveOptions {
    /** Explicit config file path; skips the search */
    configPath?: string;
    /** Directory to look for fieldscout.config.json in (default: cwd) */
    searchFrom?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from fieldscout.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(options: ResolveOptions): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('fieldscout', {
        searchPlaces: ['fieldscout.config.json'],
    });

    let result: CosmiconfigResult;
    try {
        result = options.configPath
            ? await explorer.load(options.configPath)
            : await explorer.search(options.searchFrom);
    } catch (error) {
        if (options.configPath) {
            throw new ConfigError(`Cannot read config file ${options.configPath}`, [describe(error)]);
        }
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }

    if (!result || result.isEmpty) return null;

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}`, formatIssues(parsed.error));
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (env['OPENALEX_EMAIL']) overrides.email = env['OPENALEX_EMAIL'];
    if (env['OPENALEX_API_KEY']) overrides.apiKey = env['OPENALEX_API_KEY'];
    if (env['FIELDSCOUT_OUT_DIR']) overrides.output = { dir: env['FIELDSCOUT_OUT_DIR'] };

    return overrides;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: ResolveOptions = {}
): Promise<FieldScoutConfig> {
    const fileConfig = await loadConfigFile(options);
    const envConfig = loadEnvVars(options.env ?? process.env);

    return mergeConfig([fileConfig ?? {}, envConfig, cliFlags]);
}

/**
 * Layer overrides onto the defaults, later layers winning, and validate.
 * Undefined values never override.
 */
export function mergeConfig(layers: ConfigOverrides[]): FieldScoutConfig {
    const layered = (pick: (layer: ConfigOverrides) => unknown): Record<string, unknown> =>
        layers.reduce<Record<string, unknown>>((acc, layer) => ({ ...acc, ...compact(pick(layer)) }), {});

    const field = layered((layer) => layer.field);
    const merged = {
        ...DEFAULT_CONFIG,
        ...layered((layer) => ({
            email: layer.email,
            apiKey: layer.apiKey,
            logLevel: layer.logLevel,
            jsonLogs: layer.jsonLogs,
        })),
        field: { name: field['id'], ...field },
        paging: { ...DEFAULT_CONFIG.paging, ...layered((layer) => layer.paging) },
        pacing: { ...DEFAULT_CONFIG.pacing, ...layered((layer) => layer.pacing) },
        timeouts: { ...DEFAULT_CONFIG.timeouts, ...layered((layer) => layer.timeouts) },
        courtesy: { ...DEFAULT_CONFIG.courtesy, ...layered((layer) => layer.courtesy) },
        filter: { ...DEFAULT_CONFIG.filter, ...layered((layer) => layer.filter) },
        output: { ...DEFAULT_CONFIG.output, ...layered((layer) => layer.output) },
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
    }
    return parsed.data;
}

function compact(value: unknown): Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return {};
    return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
