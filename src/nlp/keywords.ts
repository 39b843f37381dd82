import { tokenize } from './tokenizer.js';

export const DEFAULT_KEYWORD_LIMIT = 10;

/**
 * Extract the `k` most frequent tokens of a text.
 *
 * Ordered by descending frequency; equal counts keep the order in which the
 * tokens first appear. Missing or empty text yields no keywords.
 */
export function extractKeywords(text: string | null | undefined, k: number = DEFAULT_KEYWORD_LIMIT): string[] {
    if (k <= 0) return [];

    // Map preserves insertion order, so entries come out in first-seen order
    const counts = new Map<string, number>();
    for (const token of tokenize(text)) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    // Array.prototype.sort is stable: ties stay in first-seen order
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, k)
        .map(([term]) => term);
}
