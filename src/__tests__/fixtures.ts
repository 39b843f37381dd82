import type { Paper } from '../types/index.js';
import { ItemStore, type ItemStoreOptions } from '../storage/item-store.js';
import { paperTableDefinition } from '../storage/schema.js';
import { loadCorpus } from '../loader/corpus-loader.js';

/**
 * Five cs.LG papers spanning January and early February 2024.
 */
export const PAPERS: Paper[] = [
    {
        arxiv_id: '2401.00001',
        title: 'Pruning Neural Networks',
        authors: ['Ada Lovelace'],
        abstract: 'Neural network pruning.',
        categories: ['cs.LG'],
        published: '2024-01-05T09:00:00Z',
    },
    {
        arxiv_id: '2401.00002',
        title: 'Calibrated Networks',
        authors: ['Ada Lovelace', 'Alan Turing'],
        abstract: 'Network calibration.',
        categories: ['cs.LG', 'stat.ML'],
        published: '2024-01-20T12:00:00Z',
    },
    {
        arxiv_id: '2401.00003',
        title: 'Compiling Networks',
        authors: ['Grace Hopper'],
        abstract: 'Compiler network.',
        categories: ['cs.LG'],
        published: '2024-01-31T23:59:59Z',
    },
    {
        arxiv_id: '2402.00004',
        title: 'Sparse Attention',
        authors: ['Ada Lovelace'],
        abstract: 'Sparse attention.',
        categories: ['cs.LG'],
        published: '2024-02-01T00:00:00Z',
    },
    {
        arxiv_id: '2402.00005',
        title: 'Graph Attention Networks',
        authors: ['ada lovelace'],
        abstract: 'Graph attention network.',
        categories: ['cs.LG', 'cs.AI'],
        published: '2024-02-10T08:00:00Z',
    },
];

export function createStore(options: ItemStoreOptions = {}): ItemStore {
    return new ItemStore(':memory:', paperTableDefinition('arxiv_papers'), options);
}

export async function createLoadedStore(options: ItemStoreOptions = {}, papers: Paper[] = PAPERS): Promise<ItemStore> {
    const store = createStore(options);
    await loadCorpus(store, papers, { provision: { pollIntervalMs: 1 } });
    return store;
}

export function ids(items: Array<Record<string, unknown>>): unknown[] {
    return items.map((item) => item['arxiv_id']);
}
