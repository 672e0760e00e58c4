#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { join } from 'node:path';
import { resolveConfig, ConfigError, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { collectAuthors, resolveOutputPaths } from '../builder/collect-authors.js';
import { FileCheckpointStore } from '../storage/checkpoint.js';
import { RunLedger } from '../storage/run-ledger.js';
import { DEFAULT_CONFIG, type FieldScoutConfig, type LogLevel } from '../types/index.js';
import { VERSION } from '../version.js';

const program = new Command();

program
    .name('fieldscout')
    .description('Collect OpenAlex authors whose concept profile concentrates in one field.')
    .version(VERSION);

function int(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not an integer.');
    return parsed;
}

function float(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.');
    return parsed;
}

function logLevel(value: string): LogLevel {
    if (value === 'error' || value === 'warn' || value === 'info' || value === 'debug') return value;
    throw new InvalidArgumentError('Expected debug | info | warn | error.');
}

interface FieldFlags {
    config?: string;
    fieldId?: string;
    fieldName?: string;
    outDir?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface CollectFlags extends FieldFlags {
    csv?: string;
    cursor?: string;
    perPage?: number;
    flushEvery?: number;
    minScore?: number;
    topK?: number;
    minRelative?: number;
    relative: boolean;
    borderline?: number;
    minShare?: number;
    skipShare: boolean;
    maxAttempts?: number;
    email?: string;
    restart?: boolean;
}

/**
 * Options shared by every command that needs the field and output locations.
 */
function withFieldOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Config file (default: ./fieldscout.config.json)')
        .option('-f, --field-id <id>', 'Root concept id, e.g. C162324750')
        .option('-n, --field-name <name>', 'Field label used in output names and rows')
        .option('-o, --out-dir <dir>', 'Output directory')
        .option('--log-level <level>', 'Log level: debug | info | warn | error', logLevel)
        .option('--json-logs', 'Output JSON logs');
}

function fieldOverrides(opts: FieldFlags): ConfigOverrides {
    return {
        field: { id: opts.fieldId, name: opts.fieldName },
        output: { dir: opts.outDir },
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    };
}

async function loadConfig(overrides: ConfigOverrides, opts: FieldFlags): Promise<FieldScoutConfig> {
    try {
        return await resolveConfig(overrides, { configPath: opts.config });
    } catch (error) {
        fail(error);
    }
}

function fail(error: unknown): never {
    if (error instanceof ConfigError) {
        console.error(error.message);
    } else {
        getLogger().error({ error }, 'Command failed');
    }
    process.exit(1);
}

// ─── COLLECT command ──────────────────────────────────────

withFieldOptions(
    program
        .command('collect')
        .description('Collect matching authors for a field, resuming from the saved cursor')
)
    .option('--csv <path>', 'Output CSV path')
    .option('--cursor <path>', 'Cursor checkpoint path')
    .option('--per-page <n>', 'Authors per page (max 200)', int)
    .option('--flush-every <n>', 'Flush the CSV every N pages', int)
    .option('--min-score <n>', 'Minimum in-field concept score (0-100)', float)
    .option('--top-k <n>', 'Field must appear in the top K concepts (0 disables)', int)
    .option('--min-relative <ratio>', 'In-field score must reach this fraction of the top score', float)
    .option('--no-relative', 'Disable the relative-strength check')
    .option('--borderline <n>', 'Scores below this require a works-share check', float)
    .option('--min-share <ratio>', 'Minimum share of works in the field for borderline authors', float)
    .option('--no-skip-share', 'Check works share even when the top concept is in the field')
    .option('--max-attempts <n>', 'Attempts per request before giving up (0 = forever)', int)
    .option('--email <address>', 'Contact email for the OpenAlex polite pool')
    .option('--restart', 'Discard the saved cursor and start from the beginning')
    .action(async (opts: CollectFlags) => {
        const base = fieldOverrides(opts);
        const cliConfig: ConfigOverrides = {
            ...base,
            output: { ...base.output, csvPath: opts.csv, cursorPath: opts.cursor },
            paging: { perPage: opts.perPage, flushEveryPages: opts.flushEvery },
            pacing: { maxAttempts: opts.maxAttempts },
            filter: {
                minAbsoluteScore: opts.minScore,
                topK: opts.topK,
                relativeThreshold: opts.relative ? opts.minRelative : null,
                borderlineThreshold: opts.borderline,
                minShare: opts.minShare,
                skipShareIfTopInField: opts.skipShare ? undefined : false,
            },
            email: opts.email,
        };

        const config = await loadConfig(cliConfig, opts);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        const controller = new AbortController();
        process.on('SIGINT', () => {
            if (controller.signal.aborted) return;
            logger.warn('Interrupt received, finishing current page and checkpointing');
            controller.abort();
        });

        try {
            const summary = await collectAuthors(config, { signal: controller.signal, restart: opts.restart });
            logger.info({ stopReason: summary.stopReason, kept: summary.kept }, 'Done');
        } catch (error) {
            logger.error({ error }, 'Collection failed');
            process.exit(1);
        }
    });

// ─── RUNS command ─────────────────────────────────────────

program
    .command('runs')
    .description('Show recent collection runs')
    .option('-o, --out-dir <dir>', 'Output directory holding fieldscout.db', DEFAULT_CONFIG.output.dir)
    .option('--ledger <path>', 'Run ledger path (overrides --out-dir)')
    .option('-f, --field-id <id>', 'Only runs for this concept id')
    .option('-l, --limit <n>', 'Number of runs to show', int, 20)
    .action((opts: { outDir: string; ledger?: string; fieldId?: string; limit: number }) => {
        const ledger = new RunLedger(opts.ledger ?? join(opts.outDir, 'fieldscout.db'));
        const runs = ledger.listRuns(opts.limit, opts.fieldId);
        ledger.close();

        if (runs.length === 0) {
            console.log('No runs recorded.');
            return;
        }

        console.log('');
        for (const run of runs) {
            console.log(
                `  #${run.run_id}  ${run.started_at}  ${run.field_name} (${run.field_id})  ${run.status}` +
                    `  scanned=${run.scanned} kept=${run.kept} pages=${run.pages}` +
                    (run.error ? `  error=${run.error}` : '')
            );
        }
        console.log('');
    });

// ─── STATUS command ───────────────────────────────────────

withFieldOptions(program.command('status').description('Show the saved cursor for a field')).action(
    async (opts: FieldFlags) => {
        const config = await loadConfig(fieldOverrides(opts), opts);

        const paths = resolveOutputPaths(config);
        const checkpoint = new FileCheckpointStore(paths.cursorPath);
        console.log(`Field:  ${config.field.name} (${config.field.id})`);
        console.log(`CSV:    ${paths.csvPath}`);
        console.log(`Cursor: ${checkpoint.exists() ? checkpoint.load() : '(none, next run starts from the beginning)'}`);
    }
);

// ─── RESET command ────────────────────────────────────────

withFieldOptions(program.command('reset').description('Delete the saved cursor for a field')).action(
    async (opts: FieldFlags) => {
        const config = await loadConfig(fieldOverrides(opts), opts);

        const checkpoint = new FileCheckpointStore(resolveOutputPaths(config).cursorPath);
        checkpoint.clear();
        console.log(`Cursor cleared: ${checkpoint.path}`);
    }
);

program.parseAsync().catch(fail);
