import type { PaperDetailItem, StoredItem } from '../types/index.js';
import type { ItemReader, QueryInput } from '../storage/item-store.js';
import { AUTHOR_INDEX, KEYWORD_INDEX, PAPER_ID_INDEX } from '../storage/schema.js';
import { authorIndexKey, categoryKey, keywordIndexKey, paperKey } from '../items/keys.js';
import { InputError } from '../utils/errors.js';

export const DEFAULT_QUERY_LIMIT = 20;

/** Sorts after "#" and every character of an arXiv id, closing a date range. */
export const DATE_RANGE_HIGH_SENTINEL = 'zzzzzzz';

/**
 * Query 1: most recent papers in a category.
 * Table partition CATEGORY#<cat>, newest first, at most `limit` items.
 */
export function queryRecentInCategory(store: ItemReader, category: string, limit: number = DEFAULT_QUERY_LIMIT): StoredItem[] {
    assertLimit(limit);
    return queryUpTo(store, { partitionValue: categoryKey(category), scanForward: false }, limit);
}

/**
 * Query 2: every paper by an author, newest first.
 * AuthorIndex partition AUTHOR#<name>, all pages.
 */
export function queryPapersByAuthor(store: ItemReader, author: string): StoredItem[] {
    return queryAll(store, {
        indexName: AUTHOR_INDEX,
        partitionValue: authorIndexKey(author),
        scanForward: false,
    });
}

/**
 * Query 3: one paper by arXiv id, or null.
 * PaperIdIndex only holds PAPER_DETAIL items.
 */
export function getPaperById(store: ItemReader, arxivId: string): PaperDetailItem | null {
    const { items } = store.query({
        indexName: PAPER_ID_INDEX,
        partitionValue: paperKey(arxivId),
        limit: 1,
    });
    return items.find(isPaperDetailItem) ?? null;
}

/**
 * Query 4: papers in a category published between two dates (inclusive), oldest first.
 * Table partition CATEGORY#<cat>, SK between "<start>#" and "<end>#zzzzzzz", all pages.
 */
export function queryPapersInDateRange(store: ItemReader, category: string, startDate: string, endDate: string): StoredItem[] {
    return queryAll(store, {
        partitionValue: categoryKey(category),
        sortKeyBetween: { low: `${startDate}#`, high: `${endDate}#${DATE_RANGE_HIGH_SENTINEL}` },
        scanForward: true,
    });
}

/**
 * Query 5: papers whose abstract yielded a keyword, newest first.
 * KeywordIndex partition KW#<keyword, lower-cased>, at most `limit` items.
 */
export function queryPapersByKeyword(store: ItemReader, keyword: string, limit: number = DEFAULT_QUERY_LIMIT): StoredItem[] {
    assertLimit(limit);
    return queryUpTo(
        store,
        { indexName: KEYWORD_INDEX, partitionValue: keywordIndexKey(keyword), scanForward: false },
        limit
    );
}

/**
 * Follow continuation keys until the partition is exhausted.
 */
function queryAll(store: ItemReader, input: QueryInput): StoredItem[] {
    const items: StoredItem[] = [];
    let exclusiveStartKey = input.exclusiveStartKey;

    do {
        const page = store.query({ ...input, exclusiveStartKey });
        items.push(...page.items);
        exclusiveStartKey = page.lastEvaluatedKey;
    } while (exclusiveStartKey);

    return items;
}

/**
 * Follow continuation keys until `limit` items are read or the partition ends.
 * A page may hold fewer items than asked for when the store caps page size.
 */
function queryUpTo(store: ItemReader, input: QueryInput, limit: number): StoredItem[] {
    const items: StoredItem[] = [];
    let exclusiveStartKey = input.exclusiveStartKey;

    do {
        const page = store.query({ ...input, limit: limit - items.length, exclusiveStartKey });
        items.push(...page.items);
        exclusiveStartKey = page.lastEvaluatedKey;
    } while (exclusiveStartKey && items.length < limit);

    return items;
}

export function isPaperDetailItem(item: StoredItem): item is PaperDetailItem {
    return item['item_type'] === 'PAPER_DETAIL' && typeof item['arxiv_id'] === 'string';
}

function assertLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new InputError(`limit must be a positive integer, got ${limit}`);
    }
}
