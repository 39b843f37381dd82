import type { StoredItem } from '../types/index.js';

/**
 * Base class for every error paperdex raises on purpose.
 */
export class PaperdexError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'PaperdexError';
    }
}

/**
 * Malformed corpus record, query parameter or CLI argument.
 * Raised at the boundary; never reaches the store.
 */
export class InputError extends PaperdexError {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message, 'INVALID_INPUT');
        this.name = 'InputError';
    }

    /**
     * Format the message and issue list for display.
     */
    format(): string {
        if (this.issues.length === 0) return this.message;
        return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
    }
}

export class ConfigError extends PaperdexError {
    constructor(message: string) {
        super(message, 'INVALID_CONFIG');
        this.name = 'ConfigError';
    }
}

/**
 * Failure inside the item store. `retryable` marks transient conditions
 * (database busy or locked) that a caller may retry.
 */
export class StoreError extends PaperdexError {
    public readonly operation: string;
    public readonly key: string;
    public readonly retryable: boolean;
    public readonly alreadyExists: boolean;

    constructor(
        message: string,
        details: {
            operation: string;
            key: string;
            cause?: unknown;
            retryable?: boolean;
            alreadyExists?: boolean;
        }
    ) {
        super(`${details.operation} failed for ${details.key}: ${message}`, 'STORE_ERROR', { cause: details.cause });
        this.name = 'StoreError';
        this.operation = details.operation;
        this.key = details.key;
        this.retryable = details.retryable ?? false;
        this.alreadyExists = details.alreadyExists ?? false;
    }
}

export class ProvisioningError extends PaperdexError {
    constructor(
        message: string,
        public readonly table: string,
        cause?: unknown
    ) {
        super(message, 'PROVISIONING_FAILED', { cause });
        this.name = 'ProvisioningError';
    }
}

/**
 * A write batch that could not be committed. None of `unprocessedItems`
 * were confirmed; batches up to `lastCommittedBatch` are durable.
 */
export class BatchWriteError extends PaperdexError {
    constructor(
        message: string,
        public readonly batchIndex: number,
        public readonly paperIndices: number[],
        public readonly unprocessedItems: StoredItem[],
        public readonly lastCommittedBatch: number,
        cause?: unknown
    ) {
        super(message, 'BATCH_WRITE_FAILED', { cause });
        this.name = 'BatchWriteError';
    }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof InputError) return error.format();
    if (error instanceof Error) return error.message;
    return String(error);
}
