/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Full paperdex configuration merged from CLI flags, env vars, and config file.
 */
export interface PaperdexConfig {
    // Store
    dbPath: string;
    table: string;
    pageSize: number;

    // Loader
    batchSize: number;
    keywordLimit: number;
    maxRetries: number;

    // HTTP
    port: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PaperdexConfig = {
    dbPath: './paperdex.db',
    table: 'arxiv_papers',
    pageSize: 100,
    batchSize: 25,
    keywordLimit: 10,
    maxRetries: 3,
    port: 8080,
    logLevel: 'info',
    jsonLogs: false,
};
