import { ProvisioningError, StoreError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { TableAdmin, TableDescription } from './item-store.js';

export interface ProvisionOptions {
    /** Give up waiting for the table to become ACTIVE after this long */
    timeoutMs?: number;
    pollIntervalMs?: number;
}

export type ProvisionOutcome = 'exists' | 'created';

/**
 * Make sure the table and all its secondary indexes exist and are ready.
 *
 * Existing table → no-op. A concurrent creator winning the race is treated
 * the same as an existing table. Any other creation failure is fatal.
 */
export async function ensureTable(admin: TableAdmin, options: ProvisionOptions = {}): Promise<ProvisionOutcome> {
    const logger = getLogger();
    const table = admin.definition.name;

    if (admin.describeTable()) {
        logger.debug({ table }, 'Table already exists');
        return 'exists';
    }

    logger.info({ table, indexes: admin.definition.indexes.map((i) => i.name) }, 'Creating table');
    try {
        admin.createTable();
    } catch (error) {
        if (!(error instanceof StoreError && error.alreadyExists)) {
            throw new ProvisioningError(`Could not create table ${table}`, table, error);
        }
        logger.warn({ table }, 'Table was created concurrently');
    }

    await waitUntilActive(admin, options);
    return 'created';
}

/**
 * Poll until the table reports ACTIVE with every index present.
 */
export async function waitUntilActive(admin: TableAdmin, options: ProvisionOptions = {}): Promise<TableDescription> {
    const logger = getLogger();
    const { timeoutMs = 30000, pollIntervalMs = 200 } = options;
    const table = admin.definition.name;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
        const description = admin.describeTable();
        if (description && isReady(description)) {
            logger.debug({ table }, 'Table is active');
            return description;
        }
        if (Date.now() >= deadline) {
            throw new ProvisioningError(`Table ${table} did not become active within ${timeoutMs}ms`, table);
        }
        await sleep(pollIntervalMs);
    }
}

function isReady(description: TableDescription): boolean {
    return description.status === 'ACTIVE' && description.indexes.every((i) => i.status === 'ACTIVE');
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
