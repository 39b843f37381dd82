import { InvalidArgumentError } from 'commander';
import type { PaperdexConfig } from '../types/index.js';
import { ItemStore } from '../storage/item-store.js';
import { paperTableDefinition } from '../storage/schema.js';
import { readCorpus, loadCorpus, type LoadSummary } from '../loader/corpus-loader.js';

/**
 * Commander argument parser for counts such as `--limit` and `--batch-size`.
 */
export function positiveInt(value: string): number {
    if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parseInt(value, 10);
}

export function openStore(config: PaperdexConfig): ItemStore {
    return new ItemStore(config.dbPath, paperTableDefinition(config.table), { pageSize: config.pageSize });
}

/**
 * Validate a corpus file, then load it. The store is only opened once the
 * corpus is known to be good, so a bad file leaves no database behind.
 */
export async function loadCorpusFile(
    papersPath: string,
    config: PaperdexConfig,
    onProgress: (line: string) => void
): Promise<LoadSummary> {
    const papers = await readCorpus(papersPath);

    const store = openStore(config);
    try {
        return await loadCorpus(store, papers, {
            keywordLimit: config.keywordLimit,
            batchSize: config.batchSize,
            maxRetries: config.maxRetries,
            onProgress,
        });
    } finally {
        store.close();
    }
}
