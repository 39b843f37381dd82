import { describe, it, expect } from 'vitest';
import { projectPaper, countByVariant } from '../items/projector.js';
import {
    keywordIndexKey,
    publishedDate,
    datedSortKey,
    categoryKey,
    authorIndexKey,
    MISSING_DATE,
} from '../items/keys.js';
import type { Paper } from '../types/index.js';

const paper: Paper = {
    arxiv_id: '2401.00001',
    title: 'Sparse Attention for Graph Networks',
    authors: ['Ada Lovelace', 'Alan Turing'],
    abstract: 'Graph networks learn graph structure. Sparse attention helps graph networks scale.',
    categories: ['cs.LG', 'cs.AI'],
    published: '2024-01-15T10:00:00Z',
};

const KEYWORDS = ['graph', 'networks', 'learn', 'structure', 'sparse', 'attention', 'helps', 'scale'];

describe('Keys', () => {
    it('should take the date part of a timestamp', () => {
        expect(publishedDate('2024-01-15T10:00:00Z')).toBe('2024-01-15');
    });

    it('should use a sentinel date when published is missing', () => {
        expect(publishedDate(null)).toBe('0000-00-00');
        expect(publishedDate(undefined)).toBe(MISSING_DATE);
    });

    it('should put the date before the id in sort keys', () => {
        expect(datedSortKey('2024-01-15', '2401.00001')).toBe('2024-01-15#2401.00001');
    });

    it('should lowercase only the keyword index partition', () => {
        expect(keywordIndexKey('Network')).toBe('KW#network');
        expect(authorIndexKey('Ada Lovelace')).toBe('AUTHOR#Ada Lovelace');
        expect(categoryKey('cs.LG')).toBe('CATEGORY#cs.LG');
    });
});

describe('projectPaper', () => {
    const items = projectPaper(paper);

    it('should produce detail, category, author and keyword items in order', () => {
        expect(items.map((i) => i.item_type)).toEqual([
            'PAPER_DETAIL',
            'CATEGORY_ITEM',
            'CATEGORY_ITEM',
            'AUTHOR_ITEM',
            'AUTHOR_ITEM',
            ...KEYWORDS.map(() => 'KEYWORD_ITEM'),
        ]);
    });

    it('should build the full detail item', () => {
        expect(items[0]).toEqual({
            PK: 'PAPER#2401.00001',
            SK: 'DETAIL',
            GSI3PK: 'PAPER#2401.00001',
            GSI3SK: 'DETAIL',
            item_type: 'PAPER_DETAIL',
            arxiv_id: '2401.00001',
            title: 'Sparse Attention for Graph Networks',
            authors: ['Ada Lovelace', 'Alan Turing'],
            abstract: 'Graph networks learn graph structure. Sparse attention helps graph networks scale.',
            categories: ['cs.LG', 'cs.AI'],
            keywords: KEYWORDS,
            published: '2024-01-15T10:00:00Z',
        });
    });

    it('should produce one category item per category with the id in its sort key', () => {
        const categoryItems = items.filter((i) => i.item_type === 'CATEGORY_ITEM');
        expect(categoryItems.map((i) => i.PK)).toEqual(['CATEGORY#cs.LG', 'CATEGORY#cs.AI']);
        for (const item of categoryItems) {
            expect(item.SK).toBe('2024-01-15#2401.00001');
        }
    });

    it('should build author items with the author index key', () => {
        expect(items[3]).toEqual({
            PK: 'AUTHORITEM#Ada Lovelace',
            SK: '2024-01-15#2401.00001',
            GSI1PK: 'AUTHOR#Ada Lovelace',
            GSI1SK: '2024-01-15#2401.00001',
            item_type: 'AUTHOR_ITEM',
            arxiv_id: '2401.00001',
            title: 'Sparse Attention for Graph Networks',
            categories: ['cs.LG', 'cs.AI'],
            published: '2024-01-15T10:00:00Z',
        });
    });

    it('should build keyword items with the keyword index key', () => {
        const keywordItems = items.filter((i) => i.item_type === 'KEYWORD_ITEM');
        expect(keywordItems.map((i) => i.PK)).toEqual(KEYWORDS.map((k) => `KEYWORDITEM#${k}`));
        expect(keywordItems[0]).toEqual({
            PK: 'KEYWORDITEM#graph',
            SK: '2024-01-15#2401.00001',
            GSI2PK: 'KW#graph',
            GSI2SK: '2024-01-15#2401.00001',
            item_type: 'KEYWORD_ITEM',
            arxiv_id: '2401.00001',
            title: 'Sparse Attention for Graph Networks',
            categories: ['cs.LG', 'cs.AI'],
            published: '2024-01-15T10:00:00Z',
        });
    });

    it('should keep differently-cased authors as distinct entities', () => {
        const projected = projectPaper({ ...paper, authors: ['ada lovelace', 'Ada Lovelace'] });
        const authorKeys = projected.filter((i) => i.item_type === 'AUTHOR_ITEM').map((i) => i.PK);
        expect(authorKeys).toEqual(['AUTHORITEM#ada lovelace', 'AUTHORITEM#Ada Lovelace']);
    });

    it('should collapse an author repeated within one paper', () => {
        const projected = projectPaper({ ...paper, authors: ['Ada Lovelace', 'Ada Lovelace'] });
        expect(countByVariant(projected).AUTHOR_ITEM).toBe(1);
    });

    it('should place undated papers under the sentinel date', () => {
        const projected = projectPaper({ ...paper, published: null });
        expect(projected[1]?.SK).toBe('0000-00-00#2401.00001');
        expect(projected[0]?.published).toBeNull();
    });

    it('should honor the keyword limit', () => {
        const projected = projectPaper(paper, { keywordLimit: 2 });
        expect(countByVariant(projected).KEYWORD_ITEM).toBe(2);
        expect(projected[0]).toMatchObject({ keywords: ['graph', 'networks'] });
    });

    it('should produce only the detail item for a bare record', () => {
        const projected = projectPaper({ arxiv_id: '2401.09999', title: '', authors: [], abstract: '', categories: [], published: null });
        expect(projected).toHaveLength(1);
        expect(projected[0]?.item_type).toBe('PAPER_DETAIL');
    });

    it('should be deterministic', () => {
        expect(projectPaper(paper)).toEqual(items);
    });
});

describe('countByVariant', () => {
    it('should tally items per type', () => {
        expect(countByVariant(projectPaper(paper))).toEqual({
            PAPER_DETAIL: 1,
            CATEGORY_ITEM: 2,
            AUTHOR_ITEM: 2,
            KEYWORD_ITEM: 8,
        });
    });
});
