import type {
    Paper,
    DerivedItem,
    ItemType,
    PaperDetailItem,
    CategoryItem,
    AuthorItem,
    KeywordItem,
} from '../types/index.js';
import { extractKeywords, DEFAULT_KEYWORD_LIMIT } from '../nlp/keywords.js';
import {
    DETAIL_SORT_KEY,
    paperKey,
    categoryKey,
    authorItemKey,
    authorIndexKey,
    keywordItemKey,
    keywordIndexKey,
    datedSortKey,
    publishedDate,
} from './keys.js';

export interface ProjectionOptions {
    keywordLimit?: number;
}

/**
 * Fan one paper out into every item its access patterns need:
 *
 * 1. PAPER_DETAIL: full record, reachable through PaperIdIndex
 * 2. CATEGORY_ITEM: one per category, the category partition is the range
 * 3. AUTHOR_ITEM: one per distinct author, reachable through AuthorIndex
 * 4. KEYWORD_ITEM: one per distinct keyword, reachable through KeywordIndex
 *
 * Author and category strings are used verbatim. Only the keyword index
 * partition is lower-cased; stored payloads keep their original text.
 */
export function projectPaper(paper: Paper, options: ProjectionOptions = {}): DerivedItem[] {
    const { arxiv_id, title, authors, abstract, categories, published } = paper;
    const keywords = extractKeywords(abstract, options.keywordLimit ?? DEFAULT_KEYWORD_LIMIT);
    const sortKey = datedSortKey(publishedDate(published), arxiv_id);

    const items: DerivedItem[] = [];

    const detail: PaperDetailItem = {
        PK: paperKey(arxiv_id),
        SK: DETAIL_SORT_KEY,
        GSI3PK: paperKey(arxiv_id),
        GSI3SK: DETAIL_SORT_KEY,
        item_type: 'PAPER_DETAIL',
        arxiv_id,
        title,
        authors,
        abstract,
        categories,
        keywords,
        published,
    };
    items.push(detail);

    for (const category of categories) {
        const item: CategoryItem = {
            PK: categoryKey(category),
            SK: sortKey,
            item_type: 'CATEGORY_ITEM',
            arxiv_id,
            title,
            authors,
            abstract,
            categories,
            keywords,
            published,
        };
        items.push(item);
    }

    for (const author of new Set(authors)) {
        const item: AuthorItem = {
            PK: authorItemKey(author),
            SK: sortKey,
            GSI1PK: authorIndexKey(author),
            GSI1SK: sortKey,
            item_type: 'AUTHOR_ITEM',
            arxiv_id,
            title,
            categories,
            published,
        };
        items.push(item);
    }

    for (const keyword of new Set(keywords)) {
        const item: KeywordItem = {
            PK: keywordItemKey(keyword),
            SK: sortKey,
            GSI2PK: keywordIndexKey(keyword),
            GSI2SK: sortKey,
            item_type: 'KEYWORD_ITEM',
            arxiv_id,
            title,
            categories,
            published,
        };
        items.push(item);
    }

    return items;
}

/**
 * Count items per variant.
 */
export function countByVariant(items: Iterable<DerivedItem>): Record<ItemType, number> {
    const counts: Record<ItemType, number> = {
        PAPER_DETAIL: 0,
        CATEGORY_ITEM: 0,
        AUTHOR_ITEM: 0,
        KEYWORD_ITEM: 0,
    };
    for (const item of items) {
        counts[item.item_type]++;
    }
    return counts;
}
