import { z } from 'zod';
import type { Paper } from '../types/index.js';
import { InputError } from '../utils/errors.js';

/**
 * One corpus record. Only `arxiv_id` is mandatory; absent lists default to
 * empty, absent text to "", and an absent timestamp to null.
 */
export const PaperRecordSchema = z.object({
    arxiv_id: z.string().min(1),
    title: z.string().nullish().transform((v) => v ?? ''),
    authors: z.array(z.string()).nullish().transform((v) => v ?? []),
    abstract: z.string().nullish().transform((v) => v ?? ''),
    categories: z.array(z.string()).nullish().transform((v) => v ?? []),
    published: z.string().nullish().transform((v) => v || null),
});

export const CorpusSchema = z.array(z.unknown());

/**
 * Validate every record of a parsed corpus, collecting all issues before failing.
 */
export function parseCorpus(raw: unknown): Paper[] {
    const corpus = CorpusSchema.safeParse(raw);
    if (!corpus.success) {
        throw new InputError('Corpus must be a JSON array of paper records');
    }

    const papers: Paper[] = [];
    const issues: string[] = [];

    corpus.data.forEach((record, index) => {
        const parsed = PaperRecordSchema.safeParse(record);
        if (parsed.success) {
            papers.push(parsed.data);
        } else {
            for (const issue of parsed.error.issues) {
                issues.push(`[${index}] ${issue.path.join('.') || '(record)'}: ${issue.message}`);
            }
        }
    });

    if (issues.length > 0) {
        throw new InputError(`Corpus has ${issues.length} invalid field(s)`, issues);
    }
    return papers;
}
