/**
 * Key builders for the single-table layout.
 *
 * Sort keys put the publication date before the paper id, so a partition
 * reads in chronological order and same-day papers order by id.
 */

export const DETAIL_SORT_KEY = 'DETAIL';

/** Sort-key date for papers without a publication timestamp. */
export const MISSING_DATE = '0000-00-00';

export const paperKey = (arxivId: string): string => `PAPER#${arxivId}`;
export const categoryKey = (category: string): string => `CATEGORY#${category}`;
export const authorItemKey = (author: string): string => `AUTHORITEM#${author}`;
export const authorIndexKey = (author: string): string => `AUTHOR#${author}`;
export const keywordItemKey = (keyword: string): string => `KEYWORDITEM#${keyword}`;
export const keywordIndexKey = (keyword: string): string => `KW#${keyword.toLowerCase()}`;

export function datedSortKey(date: string, arxivId: string): string {
    return `${date}#${arxivId}`;
}

/**
 * Date part (YYYY-MM-DD) of an ISO timestamp.
 */
export function publishedDate(published: string | null | undefined): string {
    return published ? published.slice(0, 10) : MISSING_DATE;
}
