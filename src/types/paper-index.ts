import type { Paper } from './paper.js';
import type { CitationDirection } from './citation.js';

/**
 * Per-call options for index lookups.
 */
export interface IndexRequestOptions {
    /** Aborts in-flight requests when the caller gives up */
    signal?: AbortSignal;
}

/**
 * Interface for the remote paper index (OpenAlex).
 * Implementations normalize results into the common Paper interface.
 */
export interface PaperIndexClient {
    /** Human-readable index name */
    readonly name: string;

    /**
     * Canonical form of a paper ID, so that equivalent spellings compare equal.
     */
    normalizeId(paperId: string): string;

    /**
     * Search for papers by keywords, most-cited first.
     * Abstracts may be missing on some results.
     */
    search(query: string, maxResults: number, yearFrom?: number, options?: IndexRequestOptions): Promise<Paper[]>;

    /**
     * Fetch a single paper by ID.
     * @throws PaperNotFoundError when the ID does not resolve
     */
    getById(paperId: string, options?: IndexRequestOptions): Promise<Paper>;

    /**
     * IDs of neighboring works in one citation direction, capped at `maxResults`.
     */
    getCitations(
        paperId: string,
        direction: CitationDirection,
        maxResults: number,
        options?: IndexRequestOptions
    ): Promise<string[]>;
}
