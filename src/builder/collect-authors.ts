import { join } from 'node:path';
import type { CollectionSummary, FieldScoutConfig } from '../types/index.js';
import { OPENALEX_BASE, OpenAlexCatalog } from '../sources/openalex.js';
import { safeName } from '../sources/utils.js';
import { TaxonomyPreloader } from '../taxonomy/preloader.js';
import { CountOracle } from '../filter/count-oracle.js';
import { RelevanceFilter } from '../filter/relevance.js';
import { FileCheckpointStore } from '../storage/checkpoint.js';
import { CsvSink } from '../storage/csv-sink.js';
import { RunLedger } from '../storage/run-ledger.js';
import { createPaceState, RateLimitedClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { AuthorCollector } from './collector.js';

export interface OutputPaths {
    csvPath: string;
    cursorPath: string;
    ledgerPath: string;
}

/**
 * Output locations, derived from the field name unless configured explicitly.
 */
export function resolveOutputPaths(config: FieldScoutConfig): OutputPaths {
    const base = safeName(config.field.name);
    const { dir } = config.output;

    return {
        csvPath: config.output.csvPath ?? join(dir, `${base}_authors.csv`),
        cursorPath: config.output.cursorPath ?? join(dir, `${base}_cursor.txt`),
        ledgerPath: config.output.ledgerPath ?? join(dir, 'fieldscout.db'),
    };
}

export interface CollectRunOptions {
    signal?: AbortSignal;
    /** Discard the saved cursor and start from the beginning */
    restart?: boolean;
}

/**
 * Run one collection for the configured field and record it in the run ledger.
 */
export async function collectAuthors(
    config: FieldScoutConfig,
    options: CollectRunOptions = {}
): Promise<CollectionSummary> {
    const logger = getLogger();
    const paths = resolveOutputPaths(config);

    const pace = createPaceState(config.pacing);
    const client = new RateLimitedClient({
        baseUrl: OPENALEX_BASE,
        pace,
        maxAttempts: config.pacing.maxAttempts,
        email: config.email,
    });
    const catalog = new OpenAlexCatalog(client, {
        perPage: config.paging.perPage,
        apiKey: config.apiKey,
        email: config.email,
        timeouts: config.timeouts,
    });

    const checkpoint = new FileCheckpointStore(paths.cursorPath);
    if (options.restart) {
        checkpoint.clear();
    }

    const collector = new AuthorCollector(
        {
            catalog,
            preloader: new TaxonomyPreloader(catalog, { pageDelay: config.courtesy.preloadDelay }),
            filter: new RelevanceFilter(
                config.filter,
                config.field.id,
                new CountOracle(catalog, { courtesyDelay: config.courtesy.countDelay })
            ),
            checkpoint,
            sink: new CsvSink(paths.csvPath),
        },
        {
            field: config.field,
            flushEveryPages: config.paging.flushEveryPages,
            signal: options.signal,
            pace: client.pace,
        }
    );

    logger.info(
        {
            field: config.field.name,
            fieldId: config.field.id,
            ...config.filter,
            out: paths.csvPath,
        },
        'Starting collection'
    );

    const ledger = new RunLedger(paths.ledgerPath);
    const runId = ledger.startRun(config.field, redact(config));
    const startTime = Date.now();

    try {
        const summary = await collector.run();
        ledger.finishRun(runId, {
            status: summary.stopReason === 'interrupted' ? 'interrupted' : 'completed',
            summary,
        });

        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        logger.info(
            {
                runId,
                stopReason: summary.stopReason,
                scanned: summary.scanned,
                kept: summary.kept,
                rejections: summary.rejections,
                requests: client.getStats(),
                elapsed: `${elapsed}s`,
            },
            'Collection finished'
        );
        return summary;
    } catch (error) {
        ledger.finishRun(runId, {
            status: 'failed',
            error: error instanceof Error ? error.message : String(error),
        });
        throw error;
    } finally {
        ledger.close();
    }
}

function redact(config: FieldScoutConfig): FieldScoutConfig {
    return config.apiKey ? { ...config, apiKey: '[redacted]' } : config;
}
