import { readFile } from 'node:fs/promises';
import type { Paper, ProjectedItem } from '../types/index.js';
import { projectPaper, countByVariant } from '../items/projector.js';
import { ensureTable, type ProvisionOptions, type ProvisionOutcome } from '../storage/provisioner.js';
import type { ItemWriter, TableAdmin } from '../storage/item-store.js';
import { InputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { writeItems, type BatchProgress } from './batch-writer.js';
import { parseCorpus } from './paper-record.js';

export interface LoadOptions {
    keywordLimit?: number;
    batchSize?: number;
    maxRetries?: number;
    provision?: ProvisionOptions;
    /** Human-readable progress lines */
    onProgress?: (line: string) => void;
}

export interface LoadSummary {
    papers: number;
    items: number;
    denormalizationFactor: number;
    breakdown: {
        category: number;
        author: number;
        keyword: number;
        paperDetail: number;
    };
    batches: number;
}

/**
 * Read and validate a corpus JSON file.
 */
export async function readCorpus(path: string): Promise<Paper[]> {
    const text = await readFile(path, 'utf-8');
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new InputError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseCorpus(raw);
}

/**
 * Load a corpus into the store:
 *
 * 1. Ensure the table and its indexes exist
 * 2. Project every paper into its derived items (all before any write)
 * 3. Write the items in batches
 */
export async function loadCorpus(
    store: TableAdmin & ItemWriter,
    papers: readonly Paper[],
    options: LoadOptions = {}
): Promise<LoadSummary> {
    const logger = getLogger();
    const progress = options.onProgress ?? (() => undefined);
    const table = store.definition.name;

    const outcome: ProvisionOutcome = await ensureTable(store, options.provision);
    progress(outcome === 'created' ? `Created table ${table} with indexes ${indexNames(store)}` : `Table ${table} already exists`);

    progress('Extracting keywords from abstracts...');
    const projected: ProjectedItem[] = [];
    papers.forEach((paper, paperIndex) => {
        for (const item of projectPaper(paper, { keywordLimit: options.keywordLimit })) {
            projected.push({ paperIndex, item });
        }
    });
    logger.info({ papers: papers.length, items: projected.length }, 'Papers projected');

    const result = await writeItems(store, projected, {
        batchSize: options.batchSize,
        maxRetries: options.maxRetries,
        onBatch: ({ batchIndex, totalBatches }: BatchProgress) => {
            if ((batchIndex + 1) % 100 === 0 || batchIndex + 1 === totalBatches) {
                progress(`Wrote batch ${batchIndex + 1}/${totalBatches}`);
            }
        },
    });

    const counts = countByVariant(projected.map((p) => p.item));
    const summary: LoadSummary = {
        papers: papers.length,
        items: projected.length,
        denormalizationFactor: papers.length > 0 ? projected.length / papers.length : 0,
        breakdown: {
            category: counts.CATEGORY_ITEM,
            author: counts.AUTHOR_ITEM,
            keyword: counts.KEYWORD_ITEM,
            paperDetail: counts.PAPER_DETAIL,
        },
        batches: result.batches,
    };

    logger.info({ ...summary }, 'Corpus loaded');
    return summary;
}

/**
 * Render the end-of-load report.
 */
export function formatLoadSummary(summary: LoadSummary): string[] {
    return [
        `Loaded ${summary.papers} papers`,
        `Created ${summary.items} items (denormalized)`,
        `Denormalization factor: ${summary.denormalizationFactor.toFixed(1)}x`,
        'Storage breakdown:',
        `  - Category items: ${summary.breakdown.category}`,
        `  - Author items: ${summary.breakdown.author}`,
        `  - Keyword items: ${summary.breakdown.keyword}`,
        `  - Paper ID items: ${summary.breakdown.paperDetail}`,
    ];
}

function indexNames(store: TableAdmin): string {
    return store.definition.indexes.map((i) => i.name).join(', ');
}
