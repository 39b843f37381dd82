/**
 * Stored item shapes for the single-table paper layout.
 *
 * Every item carries its primary key (PK/SK) and an `item_type` tag.
 * Author and keyword rows additionally carry the key pair of the
 * secondary index that serves their query pattern.
 */

/**
 * Any value an item attribute may hold.
 */
export type AttributeValue =
    | string
    | number
    | boolean
    | null
    | AttributeValue[]
    | { [key: string]: AttributeValue };

/**
 * A stored item: a flat map of named attributes.
 */
export type StoredItem = Record<string, AttributeValue>;

export type ItemType = 'PAPER_DETAIL' | 'CATEGORY_ITEM' | 'AUTHOR_ITEM' | 'KEYWORD_ITEM';

export type PaperDetailItem = {
    PK: string;
    SK: string;
    GSI3PK: string;
    GSI3SK: string;
    item_type: 'PAPER_DETAIL';
    arxiv_id: string;
    title: string;
    authors: string[];
    abstract: string;
    categories: string[];
    keywords: string[];
    published: string | null;
};

export type CategoryItem = {
    PK: string;
    SK: string;
    item_type: 'CATEGORY_ITEM';
    arxiv_id: string;
    title: string;
    authors: string[];
    abstract: string;
    categories: string[];
    keywords: string[];
    published: string | null;
};

export type AuthorItem = {
    PK: string;
    SK: string;
    GSI1PK: string;
    GSI1SK: string;
    item_type: 'AUTHOR_ITEM';
    arxiv_id: string;
    title: string;
    categories: string[];
    published: string | null;
};

export type KeywordItem = {
    PK: string;
    SK: string;
    GSI2PK: string;
    GSI2SK: string;
    item_type: 'KEYWORD_ITEM';
    arxiv_id: string;
    title: string;
    categories: string[];
    published: string | null;
};

export type DerivedItem = PaperDetailItem | CategoryItem | AuthorItem | KeywordItem;

/**
 * A derived item tagged with the index of the source record it came from,
 * so a failed write batch can name the papers it covered.
 */
export interface ProjectedItem {
    paperIndex: number;
    item: DerivedItem;
}
