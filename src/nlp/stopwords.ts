/**
 * Fixed stopword list for keyword extraction.
 * Function words plus the boilerplate verbs and nouns of abstracts.
 * No stemming.
 */
export const STOPWORDS: ReadonlySet<string> = new Set([
    'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
    'of', 'with', 'by', 'from', 'up', 'about', 'into', 'through', 'during',
    'is', 'are', 'was', 'were', 'be', 'been', 'being', 'have', 'has', 'had',
    'do', 'does', 'did', 'will', 'would', 'could', 'should', 'may', 'might',
    'can', 'this', 'that', 'these', 'those', 'we', 'our', 'use', 'using',
    // Academic boilerplate
    'based', 'approach', 'method', 'paper', 'propose', 'proposed', 'show',
]);
