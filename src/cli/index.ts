#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig, parseLogLevel } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { BatchWriteError, errorMessage } from '../utils/errors.js';
import { formatLoadSummary } from '../loader/corpus-loader.js';
import { ReadApiServer } from '../api/read-api-server.js';
import { DEFAULT_QUERY_LIMIT } from '../queries/executors.js';
import { runQuery, type QueryCommand } from './query-runner.js';
import { loadCorpusFile, openStore, positiveInt } from './commands.js';
import type { PaperdexConfig } from '../types/index.js';

const VERSION = '1.0.0';

interface GlobalOptions {
    db?: string;
    table?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface LoadCommandOptions {
    batchSize?: number;
    keywordLimit?: number;
}

interface LimitOptions {
    limit: number;
}

const program = new Command();

program
    .name('paperdex')
    .description('Load arXiv paper records into a partitioned item store and query them.')
    .version(VERSION)
    .option('--db <path>', 'SQLite database file')
    .option('--table <name>', 'Item table name')
    .option('--log-level <level>', 'Log level: silent | error | warn | info | debug')
    .option('--json-logs', 'Output JSON logs');

/**
 * Resolve config (CLI flags > env > file > defaults) and start logging.
 */
async function setup(overrides: Partial<PaperdexConfig> = {}): Promise<PaperdexConfig> {
    const globals = program.opts<GlobalOptions>();
    const flags: Partial<PaperdexConfig> = { ...overrides };
    if (globals.db) flags.dbPath = globals.db;
    if (globals.table) flags.table = globals.table;
    if (globals.logLevel) flags.logLevel = parseLogLevel(globals.logLevel);
    if (globals.jsonLogs) flags.jsonLogs = true;

    const config = await resolveConfig(flags);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function fail(error: unknown, context: string): void {
    getLogger().error({ err: error }, context);
    console.error(`${context}: ${errorMessage(error)}`);
    process.exitCode = 1;
}

// ─── LOAD command ─────────────────────────────────────────

program
    .command('load')
    .description('Load a papers JSON file into the store')
    .argument('<papers>', 'Path to a JSON array of paper records')
    .option('--batch-size <n>', 'Items per write batch (max 25)', positiveInt)
    .option('--keyword-limit <k>', 'Keywords extracted per abstract', positiveInt)
    .action(async (papersPath: string, opts: LoadCommandOptions) => {
        const overrides: Partial<PaperdexConfig> = {};
        if (opts.batchSize !== undefined) overrides.batchSize = opts.batchSize;
        if (opts.keywordLimit !== undefined) overrides.keywordLimit = opts.keywordLimit;

        let config: PaperdexConfig;
        try {
            config = await setup(overrides);
        } catch (error) {
            fail(error, 'Invalid configuration');
            return;
        }

        try {
            console.log(`Loading papers from ${papersPath}...`);
            const summary = await loadCorpusFile(papersPath, config, (line) => console.log(line));
            for (const line of formatLoadSummary(summary)) {
                console.log(line);
            }
        } catch (error) {
            if (error instanceof BatchWriteError) {
                const committed = error.lastCommittedBatch >= 0 ? `batch ${error.lastCommittedBatch + 1}` : 'none';
                console.error(`Last committed batch: ${committed}`);
            }
            fail(error, 'Load failed');
        }
    });

// ─── QUERY commands ───────────────────────────────────────

async function query(command: QueryCommand): Promise<void> {
    let config: PaperdexConfig;
    try {
        config = await setup();
    } catch (error) {
        fail(error, 'Invalid configuration');
        return;
    }

    const store = openStore(config);
    try {
        console.log(JSON.stringify(runQuery(store, command)));
    } catch (error) {
        fail(error, 'Query failed');
    } finally {
        store.close();
    }
}

program
    .command('recent')
    .description('Most recent papers in a category')
    .argument('<category>', 'Category code, e.g. cs.LG')
    .option('--limit <n>', 'Maximum papers', positiveInt, DEFAULT_QUERY_LIMIT)
    .action((category: string, opts: LimitOptions) => query({ kind: 'recent', category, limit: opts.limit }));

program
    .command('author')
    .description('All papers by an author')
    .argument('<author_name>', 'Author name, exactly as in the corpus')
    .action((authorName: string) => query({ kind: 'author', authorName }));

program
    .command('get')
    .description('One paper by arXiv id')
    .argument('<arxiv_id>', 'arXiv identifier')
    .action((arxivId: string) => query({ kind: 'get', arxivId }));

program
    .command('daterange')
    .description('Papers in a category published between two dates (inclusive)')
    .argument('<category>', 'Category code')
    .argument('<start_date>', 'YYYY-MM-DD')
    .argument('<end_date>', 'YYYY-MM-DD')
    .action((category: string, startDate: string, endDate: string) =>
        query({ kind: 'daterange', category, startDate, endDate })
    );

program
    .command('keyword')
    .description('Most recent papers whose abstract yields a keyword')
    .argument('<keyword>', 'Keyword (case-insensitive)')
    .option('--limit <n>', 'Maximum papers', positiveInt, DEFAULT_QUERY_LIMIT)
    .action((keyword: string, opts: LimitOptions) => query({ kind: 'keyword', keyword, limit: opts.limit }));

// ─── SERVE command ────────────────────────────────────────

program
    .command('serve')
    .description('Serve the read-only HTTP API')
    .option('-p, --port <n>', 'Port to listen on', positiveInt)
    .action(async (opts: { port?: number }) => {
        let config: PaperdexConfig;
        try {
            config = await setup(opts.port !== undefined ? { port: opts.port } : {});
        } catch (error) {
            fail(error, 'Invalid configuration');
            return;
        }

        const store = openStore(config);
        const server = new ReadApiServer({ store });

        const shutdown = (): void => {
            server
                .stop()
                .catch((error: unknown) => fail(error, 'Shutdown failed'))
                .finally(() => store.close());
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        try {
            await server.start(config.port);
        } catch (error) {
            store.close();
            fail(error, 'Server failed to start');
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show item counts')
    .action(async () => {
        let config: PaperdexConfig;
        try {
            config = await setup();
        } catch (error) {
            fail(error, 'Invalid configuration');
            return;
        }

        const store = openStore(config);
        try {
            const total = store.countItems();
            const byType = store.countByType();

            console.log(`\nTable ${config.table} (${config.dbPath})\n`);
            console.log(`  Items: ${total}`);
            for (const [type, count] of Object.entries(byType)) {
                console.log(`    ${type}: ${count}`);
            }
            console.log('');
        } catch (error) {
            fail(error, 'Inspect failed');
        } finally {
            store.close();
        }
    });

program.parseAsync().catch((error: unknown) => {
    fail(error, 'paperdex failed');
});
