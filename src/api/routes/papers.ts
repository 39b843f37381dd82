import type { Request, Response } from 'express';
import type { ItemReader } from '../../storage/item-store.js';
import {
    DEFAULT_QUERY_LIMIT,
    getPaperById,
    queryPapersByAuthor,
    queryPapersByKeyword,
    queryPapersInDateRange,
    queryRecentInCategory,
} from '../../queries/executors.js';
import { setLogParams } from '../middleware/request-log.js';

/**
 * First string value of a query-string parameter.
 */
function queryParam(req: Request, name: string): string | undefined {
    const value = req.query[name];
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
    return undefined;
}

/**
 * Parse ?limit=, defaulting when absent. Returns null when malformed.
 */
function parseLimit(raw: string | undefined): number | null {
    if (raw === undefined) return DEFAULT_QUERY_LIMIT;
    if (!/^\d+$/.test(raw)) return null;
    const limit = parseInt(raw, 10);
    return limit > 0 ? limit : null;
}

function badRequest(res: Response, reason: string): void {
    res.status(400).json({ error: reason });
}

/**
 * GET /papers/recent?category=<cat>&limit=<n>
 */
export function recentRoute(store: ItemReader) {
    return (req: Request, res: Response): void => {
        const category = queryParam(req, 'category');
        if (!category) {
            badRequest(res, 'missing category');
            return;
        }
        const limit = parseLimit(queryParam(req, 'limit'));
        if (limit === null) {
            badRequest(res, 'invalid limit');
            return;
        }

        setLogParams(res, { category, limit });
        const papers = queryRecentInCategory(store, category, limit);
        res.json({ category, papers, count: papers.length });
    };
}

/**
 * GET /papers/author/<name>
 */
export function authorRoute(store: ItemReader) {
    return (req: Request, res: Response): void => {
        const authorName = req.params[0] ?? '';
        if (!authorName) {
            badRequest(res, 'missing author_name');
            return;
        }

        setLogParams(res, { author_name: authorName });
        const papers = queryPapersByAuthor(store, authorName);
        res.json({ author_name: authorName, papers, count: papers.length });
    };
}

/**
 * GET /papers/keyword/<kw>?limit=<n>
 */
export function keywordRoute(store: ItemReader) {
    return (req: Request, res: Response): void => {
        const limit = parseLimit(queryParam(req, 'limit'));
        if (limit === null) {
            badRequest(res, 'invalid limit');
            return;
        }
        const keyword = req.params[0] ?? '';
        if (!keyword) {
            badRequest(res, 'missing keyword');
            return;
        }

        setLogParams(res, { keyword, limit });
        const papers = queryPapersByKeyword(store, keyword, limit);
        res.json({ keyword, papers, count: papers.length });
    };
}

/**
 * GET /papers/search?category=<cat>&start=<date>&end=<date>
 */
export function searchRoute(store: ItemReader) {
    return (req: Request, res: Response): void => {
        const category = queryParam(req, 'category');
        const start = queryParam(req, 'start');
        const end = queryParam(req, 'end');
        if (!category || !start || !end) {
            badRequest(res, 'missing category/start/end');
            return;
        }

        setLogParams(res, { category, start, end });
        const papers = queryPapersInDateRange(store, category, start, end);
        res.json({ category, start, end, papers, count: papers.length });
    };
}

/**
 * GET /papers/<arxiv_id>
 *
 * The id may contain "/" (old-style ids such as "hep-th/9901001").
 */
export function paperRoute(store: ItemReader) {
    return (req: Request, res: Response): void => {
        const arxivId = req.params[0] ?? '';
        if (!arxivId) {
            badRequest(res, 'missing arxiv_id');
            return;
        }

        setLogParams(res, { arxiv_id: arxivId });
        const paper = getPaperById(store, arxivId);
        if (!paper) {
            res.status(404).json({ error: 'not found' });
            return;
        }
        res.json(paper);
    };
}
