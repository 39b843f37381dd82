/**
 * A research-paper record as it arrives in the corpus JSON.
 * Validated and defaulted by `PaperRecordSchema` before projection.
 */
export interface Paper {
    /** arXiv identifier (e.g., "2401.01234"), unique across the corpus */
    arxiv_id: string;

    /** Paper title */
    title: string;

    /** Author names in source order; used verbatim inside keys */
    authors: string[];

    /** Abstract text (empty string when the source has none) */
    abstract: string;

    /** arXiv category codes (e.g., "cs.LG") */
    categories: string[];

    /** ISO-8601 publication timestamp, or null when missing */
    published: string | null;
}
