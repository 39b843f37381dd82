import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { ItemStore, MAX_BATCH_ITEMS } from '../storage/item-store.js';
import { paperTableDefinition, AUTHOR_INDEX, PAPER_ID_INDEX } from '../storage/schema.js';
import { ensureTable } from '../storage/provisioner.js';
import { InputError, StoreError } from '../utils/errors.js';
import type { StoredItem } from '../types/index.js';
import { createStore } from './fixtures.js';

function item(pk: string, sk: string, extra: StoredItem = {}): StoredItem {
    return { PK: pk, SK: sk, ...extra };
}

describe('ItemStore', () => {
    let store: ItemStore;

    beforeEach(async () => {
        store = createStore({ pageSize: 2 });
        await ensureTable(store, { pollIntervalMs: 1 });
    });

    afterEach(() => {
        store.close();
    });

    describe('tables', () => {
        it('should report the table and its indexes as active', () => {
            expect(store.describeTable()).toEqual({
                name: 'arxiv_papers',
                status: 'ACTIVE',
                indexes: [
                    { name: 'AuthorIndex', status: 'ACTIVE' },
                    { name: 'KeywordIndex', status: 'ACTIVE' },
                    { name: 'PaperIdIndex', status: 'ACTIVE' },
                ],
            });
        });

        it('should describe a table that was never created as null', () => {
            const fresh = createStore();
            expect(fresh.describeTable()).toBeNull();
            fresh.close();
        });

        it('should flag a second createTable as already existing', () => {
            let caught: unknown;
            try {
                store.createTable();
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(StoreError);
            expect(caught).toMatchObject({ alreadyExists: true, operation: 'createTable', key: 'arxiv_papers' });
        });

        it('should reject table names that are not identifiers', () => {
            expect(() => new ItemStore(':memory:', paperTableDefinition('papers; DROP TABLE x'))).toThrow(InputError);
        });

        it('should reject the catalog table name', () => {
            expect(() => new ItemStore(':memory:', paperTableDefinition('PAPERDEX_CATALOG'))).toThrow(
                'Table name "PAPERDEX_CATALOG" is reserved'
            );
        });

        it('should surface queries on a missing table as a store error', () => {
            const fresh = createStore();
            expect(() => fresh.query({ partitionValue: 'CATEGORY#cs.LG' })).toThrow(StoreError);
            fresh.close();
        });
    });

    describe('batchWrite', () => {
        it('should reject batches over the item limit', () => {
            const items = Array.from({ length: MAX_BATCH_ITEMS + 1 }, (_, i) => item('P', String(i)));
            expect(() => store.batchWrite(items)).toThrow(InputError);
            expect(store.countItems()).toBe(0);
        });

        it('should overwrite items with the same primary key', () => {
            store.batchWrite([item('P', '1', { title: 'old' })]);
            store.batchWrite([item('P', '1', { title: 'new' })]);

            expect(store.countItems()).toBe(1);
            expect(store.query({ partitionValue: 'P' }).items).toEqual([{ PK: 'P', SK: '1', title: 'new' }]);
        });

        it('should keep the last of duplicate keys within one batch', () => {
            store.batchWrite([item('P', '1', { n: 1 }), item('P', '2'), item('P', '1', { n: 3 })]);

            expect(store.countItems()).toBe(2);
            expect(store.query({ partitionValue: 'P' }).items[0]).toEqual({ PK: 'P', SK: '1', n: 3 });
        });

        it('should reject items without a primary key', () => {
            expect(() => store.batchWrite([{ SK: '1' }])).toThrow('Item is missing key attribute PK');
        });

        it('should reject non-string key attributes', () => {
            expect(() => store.batchWrite([item('P', '1', { GSI1PK: 7 })])).toThrow('Key attribute GSI1PK must be a string');
        });

        it('should write nothing when any item of a batch is invalid', () => {
            expect(() => store.batchWrite([item('P', '1'), { PK: 'P' }])).toThrow(InputError);
            expect(store.countItems()).toBe(0);
        });

        it('should count items per type', () => {
            store.batchWrite([
                item('A', '1', { item_type: 'AUTHOR_ITEM' }),
                item('A', '2', { item_type: 'AUTHOR_ITEM' }),
                item('C', '1', { item_type: 'CATEGORY_ITEM' }),
            ]);
            expect(store.countByType()).toEqual({ AUTHOR_ITEM: 2, CATEGORY_ITEM: 1 });
        });
    });

    describe('query', () => {
        beforeEach(() => {
            store.batchWrite(['2024-01-03#c', '2024-01-01#a', '2024-01-05#e', '2024-01-02#b', '2024-01-04#d'].map((sk) => item('CAT', sk)));
        });

        it('should page through a partition in ascending order', () => {
            const first = store.query({ partitionValue: 'CAT' });
            expect(first.items.map((i) => i['SK'])).toEqual(['2024-01-01#a', '2024-01-02#b']);
            expect(first.lastEvaluatedKey).toEqual({ PK: 'CAT', SK: '2024-01-02#b' });

            const second = store.query({ partitionValue: 'CAT', exclusiveStartKey: first.lastEvaluatedKey });
            expect(second.items.map((i) => i['SK'])).toEqual(['2024-01-03#c', '2024-01-04#d']);

            const third = store.query({ partitionValue: 'CAT', exclusiveStartKey: second.lastEvaluatedKey });
            expect(third.items.map((i) => i['SK'])).toEqual(['2024-01-05#e']);
            expect(third.lastEvaluatedKey).toBeUndefined();
        });

        it('should read descending when scanForward is false', () => {
            const page = store.query({ partitionValue: 'CAT', scanForward: false, limit: 1 });
            expect(page.items.map((i) => i['SK'])).toEqual(['2024-01-05#e']);
            expect(page.lastEvaluatedKey).toEqual({ PK: 'CAT', SK: '2024-01-05#e' });
        });

        it('should not return a continuation key when the page ends the partition', () => {
            const page = store.query({ partitionValue: 'CAT', sortKeyBetween: { low: '2024-01-04#', high: '2024-01-05#zzz' } });
            expect(page.items.map((i) => i['SK'])).toEqual(['2024-01-04#d', '2024-01-05#e']);
            expect(page.lastEvaluatedKey).toBeUndefined();
        });

        it('should apply inclusive sort key bounds', () => {
            const page = store.query({ partitionValue: 'CAT', sortKeyBetween: { low: '2024-01-02#b', high: '2024-01-03#c' } });
            expect(page.items.map((i) => i['SK'])).toEqual(['2024-01-02#b', '2024-01-03#c']);
        });

        it('should return an empty page for an unknown partition', () => {
            expect(store.query({ partitionValue: 'NOPE' })).toEqual({ items: [] });
        });

        it('should reject a non-positive limit', () => {
            expect(() => store.query({ partitionValue: 'CAT', limit: 0 })).toThrow(InputError);
        });
    });

    describe('secondary indexes', () => {
        const authorItem = (sk: string, pk: string): StoredItem => ({
            PK: pk,
            SK: sk,
            GSI1PK: 'AUTHOR#Ada',
            GSI1SK: sk,
            item_type: 'AUTHOR_ITEM',
            arxiv_id: sk.split('#')[1] ?? '',
            title: 'A title',
            categories: ['cs.LG'],
            published: `${sk.split('#')[0] ?? ''}T00:00:00Z`,
            abstract: 'not projected',
        });

        beforeEach(() => {
            store.batchWrite([
                authorItem('2024-01-01#x1', 'AUTHORITEM#Ada'),
                authorItem('2024-01-02#x2', 'AUTHORITEM#Ada'),
                authorItem('2024-01-03#x3', 'AUTHORITEM#Ada'),
                item('CATEGORY#cs.LG', '2024-01-01#x1', { title: 'no index keys' }),
            ]);
        });

        it('should return only projected attributes', () => {
            const page = store.query({ indexName: AUTHOR_INDEX, partitionValue: 'AUTHOR#Ada', scanForward: false, limit: 1 });
            expect(page.items).toEqual([
                {
                    PK: 'AUTHORITEM#Ada',
                    SK: '2024-01-03#x3',
                    GSI1PK: 'AUTHOR#Ada',
                    GSI1SK: '2024-01-03#x3',
                    arxiv_id: 'x3',
                    title: 'A title',
                    categories: ['cs.LG'],
                    published: '2024-01-03T00:00:00Z',
                },
            ]);
        });

        it('should return index keys and table keys as the continuation key', () => {
            const page = store.query({ indexName: AUTHOR_INDEX, partitionValue: 'AUTHOR#Ada', scanForward: false });
            expect(page.lastEvaluatedKey).toEqual({
                PK: 'AUTHORITEM#Ada',
                SK: '2024-01-02#x2',
                GSI1PK: 'AUTHOR#Ada',
                GSI1SK: '2024-01-02#x2',
            });

            const next = store.query({
                indexName: AUTHOR_INDEX,
                partitionValue: 'AUTHOR#Ada',
                scanForward: false,
                exclusiveStartKey: page.lastEvaluatedKey,
            });
            expect(next.items.map((i) => i['arxiv_id'])).toEqual(['x1']);
        });

        it('should leave items without index keys out of the index', () => {
            const page = store.query({ indexName: PAPER_ID_INDEX, partitionValue: 'CATEGORY#cs.LG' });
            expect(page.items).toEqual([]);
        });

        it('should reject an unknown index', () => {
            expect(() => store.query({ indexName: 'TitleIndex', partitionValue: 'x' })).toThrow(
                'Table arxiv_papers has no index named TitleIndex'
            );
        });
    });
});

describe('ItemStore on disk', () => {
    let dbPath: string;

    beforeEach(() => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paperdex-test-'));
        dbPath = path.join(tmpDir, 'test.db');
    });

    afterEach(() => {
        fs.rmSync(path.dirname(dbPath), { recursive: true, force: true });
    });

    it('should create the database file', () => {
        const store = new ItemStore(dbPath, paperTableDefinition('arxiv_papers'));
        store.close();
        expect(fs.existsSync(dbPath)).toBe(true);
    });

    it('should keep items across reopen', async () => {
        const first = new ItemStore(dbPath, paperTableDefinition('arxiv_papers'));
        await ensureTable(first, { pollIntervalMs: 1 });
        first.batchWrite([item('P', '1')]);
        first.close();

        const second = new ItemStore(dbPath, paperTableDefinition('arxiv_papers'));
        expect(await ensureTable(second)).toBe('exists');
        expect(second.countItems()).toBe(1);
        second.close();
    });
});
