import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, LOG_LEVELS, type LogLevel, type PaperdexConfig } from '../types/index.js';
import { CATALOG_TABLE, MAX_BATCH_ITEMS } from '../storage/item-store.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Shape of paperdex.config.json. Every field is optional; unknown keys are rejected.
 */
const ConfigFileSchema = z
    .object({
        dbPath: z.string().min(1),
        table: z.string().min(1),
        pageSize: z.number().int().positive(),
        batchSize: z.number().int().positive(),
        keywordLimit: z.number().int().nonnegative(),
        maxRetries: z.number().int().nonnegative(),
        port: z.number().int().nonnegative(),
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Load configuration from paperdex.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults then apply).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<PaperdexConfig> | null> {
    const explorer = cosmiconfig('paperdex', {
        searchPlaces: ['paperdex.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError(`Invalid config file ${result.filepath}: ${issues.join('; ')}`);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<PaperdexConfig> {
    const config: Partial<PaperdexConfig> = {};

    const dbPath = env['PAPERDEX_DB'];
    if (dbPath) config.dbPath = dbPath;

    const table = env['PAPERDEX_TABLE'];
    if (table) config.table = table;

    const port = env['PAPERDEX_PORT'];
    if (port) config.port = parseInteger(port, 'PAPERDEX_PORT');

    const logLevel = env['PAPERDEX_LOG_LEVEL'];
    if (logLevel) config.logLevel = parseLogLevel(logLevel);

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * `cliFlags` must only carry keys the user actually set.
 */
export async function resolveConfig(
    cliFlags: Partial<PaperdexConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PaperdexConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const merged: PaperdexConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };

    validateConfig(merged);
    return merged;
}

/**
 * Reject values the store or loader cannot work with.
 */
export function validateConfig(config: PaperdexConfig): void {
    if (!TABLE_NAME_PATTERN.test(config.table)) {
        throw new ConfigError(`Invalid table name "${config.table}": use letters, digits and underscores`);
    }
    if (config.table.toLowerCase() === CATALOG_TABLE) {
        throw new ConfigError(`Table name "${config.table}" is reserved`);
    }
    if (!Number.isInteger(config.batchSize) || config.batchSize < 1 || config.batchSize > MAX_BATCH_ITEMS) {
        throw new ConfigError(`batchSize must be between 1 and ${MAX_BATCH_ITEMS}, got ${config.batchSize}`);
    }
    if (!Number.isInteger(config.pageSize) || config.pageSize < 1) {
        throw new ConfigError(`pageSize must be a positive integer, got ${config.pageSize}`);
    }
    if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
        throw new ConfigError(`port must be between 0 and 65535, got ${config.port}`);
    }
}

/**
 * Parse a decimal integer option, rejecting trailing garbage ("12abc").
 */
export function parseInteger(value: string, name: string): number {
    if (!/^-?\d+$/.test(value.trim())) {
        throw new ConfigError(`${name} must be an integer, got "${value}"`);
    }
    return parseInt(value, 10);
}

export function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new ConfigError(`Invalid log level "${value}". Valid: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}
