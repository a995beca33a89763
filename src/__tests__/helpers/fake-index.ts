import type { CitationDirection, Paper, PaperIndexClient } from '../../types/index.js';
import { PaperNotFoundError, UpstreamUnavailableError } from '../../utils/errors.js';
import { normalizeWorkId } from '../../sources/utils.js';

/**
 * Build a paper with neutral defaults.
 */
export function makePaper(id: string, overrides: Partial<Paper> = {}): Paper {
    return {
        id,
        title: `Paper ${id}`,
        abstract: null,
        year: 2020,
        referencedWorkIds: [],
        authors: [],
        citedByCount: 0,
        doi: null,
        url: null,
        ...overrides,
    };
}

/**
 * In-memory paper index. Records every call so tests can assert that
 * validation happens before any lookup.
 */
export class FakeIndexClient implements PaperIndexClient {
    readonly name = 'Fake';
    readonly calls: string[] = [];
    /** Paper IDs whose lookup fails as if retries were exhausted */
    readonly failing = new Set<string>();
    /** Root ID → IDs of citing works */
    readonly citedBy = new Map<string, string[]>();
    searchResults: Paper[] = [];
    reverseLookupFails = false;
    private readonly papers = new Map<string, Paper>();

    constructor(papers: Paper[] = []) {
        for (const paper of papers) {
            this.papers.set(paper.id, paper);
        }
    }

    normalizeId(paperId: string): string {
        return normalizeWorkId(paperId);
    }

    async search(query: string, maxResults: number, yearFrom?: number): Promise<Paper[]> {
        this.calls.push(`search:${query}:${maxResults}:${yearFrom ?? ''}`);
        return this.searchResults.slice(0, maxResults);
    }

    async getById(paperId: string): Promise<Paper> {
        this.calls.push(`get:${paperId}`);
        if (this.failing.has(paperId)) {
            throw new UpstreamUnavailableError(`Lookup of ${paperId} failed`);
        }
        const paper = this.papers.get(paperId);
        if (!paper) {
            throw new PaperNotFoundError(paperId);
        }
        return paper;
    }

    async getCitations(paperId: string, direction: CitationDirection, maxResults: number): Promise<string[]> {
        this.calls.push(`citations:${direction}:${paperId}`);
        if (this.reverseLookupFails) {
            throw new UpstreamUnavailableError('Reverse lookup failed');
        }
        if (direction === 'references') {
            return (await this.getById(paperId)).referencedWorkIds.slice(0, maxResults);
        }
        return (this.citedBy.get(paperId) ?? []).slice(0, maxResults);
    }
}
