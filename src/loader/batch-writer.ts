import type { ProjectedItem } from '../types/index.js';
import { BatchWriteError, InputError, StoreError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { MAX_BATCH_ITEMS, type ItemWriter } from '../storage/item-store.js';

export interface WriteOptions {
    batchSize?: number;
    /** Retries of a batch that failed with a transient store error */
    maxRetries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
    /** Called after each committed batch */
    onBatch?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
    batchIndex: number;
    totalBatches: number;
    itemsWritten: number;
}

export interface WriteResult {
    batches: number;
    itemsWritten: number;
}

/**
 * Persist projected items in consecutive batches, one batch at a time.
 *
 * Each batch is its own unit: a failed batch leaves earlier ones committed
 * and raises a BatchWriteError naming the batch, the source papers it
 * covered and the items left unconfirmed.
 */
export async function writeItems(
    writer: ItemWriter,
    projected: readonly ProjectedItem[],
    options: WriteOptions = {}
): Promise<WriteResult> {
    const {
        batchSize = MAX_BATCH_ITEMS,
        maxRetries = 3,
        initialBackoffMs = 50,
        maxBackoffMs = 2000,
        onBatch,
    } = options;

    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_BATCH_ITEMS) {
        throw new InputError(`batchSize must be between 1 and ${MAX_BATCH_ITEMS}, got ${batchSize}`);
    }

    const logger = getLogger();
    const batches = chunk(projected, batchSize);
    let itemsWritten = 0;

    for (let batchIndex = 0; batchIndex < batches.length; batchIndex++) {
        const batch = batches[batchIndex] ?? [];
        const items = batch.map((p) => p.item);

        for (let attempt = 0; ; attempt++) {
            try {
                writer.batchWrite(items);
                break;
            } catch (error) {
                const retryable = error instanceof StoreError && error.retryable;
                if (retryable && attempt < maxRetries) {
                    const backoff = calculateBackoff(attempt, initialBackoffMs, maxBackoffMs);
                    logger.warn({ batchIndex, attempt: attempt + 1, backoffMs: backoff }, 'Transient write failure, backing off');
                    await sleep(backoff);
                    continue;
                }

                const paperIndices = [...new Set(batch.map((p) => p.paperIndex))];
                throw new BatchWriteError(
                    `Batch ${batchIndex + 1}/${batches.length} failed (papers ${paperIndices.join(', ')})`,
                    batchIndex,
                    paperIndices,
                    items,
                    batchIndex - 1,
                    error
                );
            }
        }

        itemsWritten += items.length;
        logger.debug({ batchIndex, items: items.length }, 'Batch committed');
        onBatch?.({ batchIndex, totalBatches: batches.length, itemsWritten });
    }

    return { batches: batches.length, itemsWritten };
}

export function chunk<T>(values: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < values.length; i += size) {
        chunks.push(values.slice(i, i + size));
    }
    return chunks;
}

/**
 * Exponential backoff: initial * 2^attempt, capped.
 */
export function calculateBackoff(attempt: number, initialMs: number, maxMs: number): number {
    return Math.min(initialMs * 2 ** attempt, maxMs);
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
