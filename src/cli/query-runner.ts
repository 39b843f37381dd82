import type { StoredItem } from '../types/index.js';
import type { ItemReader } from '../storage/item-store.js';
import {
    getPaperById,
    queryPapersByAuthor,
    queryPapersByKeyword,
    queryPapersInDateRange,
    queryRecentInCategory,
} from '../queries/executors.js';

export type QueryCommand =
    | { kind: 'recent'; category: string; limit: number }
    | { kind: 'author'; authorName: string }
    | { kind: 'get'; arxivId: string }
    | { kind: 'daterange'; category: string; startDate: string; endDate: string }
    | { kind: 'keyword'; keyword: string; limit: number };

/**
 * JSON document printed by every query subcommand.
 */
export interface QueryOutput {
    query_type: string;
    parameters: Record<string, string | number>;
    results: StoredItem[];
    count: number;
    execution_time_ms: number;
}

/**
 * Run one query subcommand against the store and time it.
 */
export function runQuery(
    store: ItemReader,
    command: QueryCommand,
    clock: () => number = () => performance.now()
): QueryOutput {
    const started = clock();
    const { queryType, parameters, results } = execute(store, command);
    const elapsed = clock() - started;

    return {
        query_type: queryType,
        parameters,
        results,
        count: results.length,
        execution_time_ms: Math.floor(elapsed),
    };
}

function execute(
    store: ItemReader,
    command: QueryCommand
): { queryType: string; parameters: Record<string, string | number>; results: StoredItem[] } {
    switch (command.kind) {
        case 'recent':
            return {
                queryType: 'recent_in_category',
                parameters: { category: command.category, limit: command.limit },
                results: queryRecentInCategory(store, command.category, command.limit),
            };
        case 'author':
            return {
                queryType: 'papers_by_author',
                parameters: { author_name: command.authorName },
                results: queryPapersByAuthor(store, command.authorName),
            };
        case 'get': {
            const paper = getPaperById(store, command.arxivId);
            return {
                queryType: 'get_paper_by_id',
                parameters: { arxiv_id: command.arxivId },
                results: paper ? [paper] : [],
            };
        }
        case 'daterange':
            return {
                queryType: 'papers_in_date_range',
                parameters: { category: command.category, start_date: command.startDate, end_date: command.endDate },
                results: queryPapersInDateRange(store, command.category, command.startDate, command.endDate),
            };
        case 'keyword':
            return {
                queryType: 'papers_by_keyword',
                parameters: { keyword: command.keyword, limit: command.limit },
                results: queryPapersByKeyword(store, command.keyword, command.limit),
            };
    }
}
