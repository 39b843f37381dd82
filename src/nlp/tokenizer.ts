import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize text into an array of lowercase tokens.
 * - Lowercase
 * - Keep runs of ASCII letters only (digits and punctuation split tokens)
 * - Remove stopwords
 * - Remove tokens of two characters or fewer
 * - No stemming (deterministic)
 */
export function tokenize(text: string | null | undefined): string[] {
    if (!text) return [];

    const tokens = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return tokens.filter((token) => token.length > 2 && !STOPWORDS.has(token));
}
