/**
 * Table and secondary-index definitions.
 *
 * A table has a composite primary key (partition + sort attribute) and any
 * number of global secondary indexes. An index only holds items that carry
 * its partition attribute (sparse), and exposes either every attribute or
 * the keys plus an included attribute list.
 */

export type Projection =
    | { type: 'ALL' }
    | { type: 'INCLUDE'; attributes: readonly string[] };

export interface IndexDefinition {
    name: string;
    partitionKey: string;
    sortKey: string;
    projection: Projection;
}

export interface TableDefinition {
    name: string;
    partitionKey: string;
    sortKey: string;
    indexes: readonly IndexDefinition[];
}

export const AUTHOR_INDEX = 'AuthorIndex';
export const KEYWORD_INDEX = 'KeywordIndex';
export const PAPER_ID_INDEX = 'PaperIdIndex';

/** Attributes list views need; author and keyword indexes project these. */
export const SUMMARY_ATTRIBUTES: readonly string[] = ['arxiv_id', 'title', 'categories', 'published'];

/**
 * Layout of the paper table:
 *
 * | Index        | Partition | Sort   | Projection         |
 * |--------------|-----------|--------|--------------------|
 * | (table)      | PK        | SK     | -                  |
 * | AuthorIndex  | GSI1PK    | GSI1SK | summary attributes |
 * | KeywordIndex | GSI2PK    | GSI2SK | summary attributes |
 * | PaperIdIndex | GSI3PK    | GSI3SK | all                |
 */
export function paperTableDefinition(name: string): TableDefinition {
    return {
        name,
        partitionKey: 'PK',
        sortKey: 'SK',
        indexes: [
            {
                name: AUTHOR_INDEX,
                partitionKey: 'GSI1PK',
                sortKey: 'GSI1SK',
                projection: { type: 'INCLUDE', attributes: SUMMARY_ATTRIBUTES },
            },
            {
                name: KEYWORD_INDEX,
                partitionKey: 'GSI2PK',
                sortKey: 'GSI2SK',
                projection: { type: 'INCLUDE', attributes: SUMMARY_ATTRIBUTES },
            },
            {
                name: PAPER_ID_INDEX,
                partitionKey: 'GSI3PK',
                sortKey: 'GSI3SK',
                projection: { type: 'ALL' },
            },
        ],
    };
}
