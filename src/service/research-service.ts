import type {
    AnalysisConfig,
    CitationGraph,
    Claim,
    ComparisonResult,
    GapReport,
    IndexRequestOptions,
    Paper,
    PaperIndexClient,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { extractClaims } from '../analysis/claim-extractor.js';
import { compareClaims, MAX_COMPARED_PAPERS, MIN_COMPARED_PAPERS } from '../analysis/comparator.js';
import { MAX_GAP_PAPERS, MIN_GAP_PAPERS, synthesizeGaps } from '../analysis/gap-synthesizer.js';
import { CitationGraphBuilder, parseDirection } from '../graph/citation-graph.js';
import { InvalidInputError, UpstreamUnavailableError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const MAX_SEARCH_RESULTS = 50;
export const MAX_CITATION_RESULTS = 200;

export interface PaperAbstract {
    paper: Paper;
    abstract: string | null;
}

export interface PaperClaims {
    paper: Paper;
    claims: Claim[];
}

export interface OmittedPaper {
    paperId: string;
    reason: string;
}

export interface PaperComparison {
    papers: Paper[];
    comparison: ComparisonResult;
    /** Requested papers that could not be fetched */
    omitted: OmittedPaper[];
}

export interface ResearchGapAnalysis {
    topic: string;
    papers: Paper[];
    report: GapReport;
}

function requireText(value: string, label: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
        throw new InvalidInputError(`${label} must not be empty`);
    }
    return trimmed;
}

function requireCount(value: number, label: string, min: number, max: number): number {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new InvalidInputError(`${label} must be an integer between ${min} and ${max}, got ${value}`);
    }
    return value;
}

function requireYear(value: number | undefined): number | undefined {
    if (value !== undefined && !Number.isInteger(value)) {
        throw new InvalidInputError(`yearFrom must be an integer, got ${value}`);
    }
    return value;
}

/**
 * The six operations exposed to the tool layer. Input shape is validated
 * before any request is made; single-paper operations surface fetch failures,
 * multi-paper operations drop the papers that fail.
 */
export class ResearchService {
    private readonly citationGraph: CitationGraphBuilder;

    constructor(
        private readonly index: PaperIndexClient,
        private readonly analysis: AnalysisConfig = DEFAULT_CONFIG.analysis
    ) {
        this.citationGraph = new CitationGraphBuilder(index);
    }

    async searchPapers(
        query: string,
        maxResults = 5,
        yearFrom?: number,
        options: IndexRequestOptions = {}
    ): Promise<Paper[]> {
        const text = requireText(query, 'Search query');
        requireCount(maxResults, 'maxResults', 1, MAX_SEARCH_RESULTS);
        requireYear(yearFrom);

        return this.index.search(text, maxResults, yearFrom, options);
    }

    async getPaperAbstract(paperId: string, options: IndexRequestOptions = {}): Promise<PaperAbstract> {
        const paper = await this.index.getById(requireText(paperId, 'Paper ID'), options);
        return { paper, abstract: paper.abstract };
    }

    async extractPaperClaims(paperId: string, options: IndexRequestOptions = {}): Promise<PaperClaims> {
        const paper = await this.index.getById(requireText(paperId, 'Paper ID'), options);
        return { paper, claims: extractClaims(paper) };
    }

    /**
     * @throws InvalidInputError unless 2–5 distinct IDs are given
     * @throws UpstreamUnavailableError when fewer than two papers could be fetched
     */
    async comparePapers(paperIds: readonly string[], options: IndexRequestOptions = {}): Promise<PaperComparison> {
        const ids = paperIds.map((id) => this.index.normalizeId(requireText(id, 'Paper ID')));
        requireCount(ids.length, 'Number of papers to compare', MIN_COMPARED_PAPERS, MAX_COMPARED_PAPERS);
        if (new Set(ids).size !== ids.length) {
            throw new InvalidInputError('Paper IDs to compare must be distinct');
        }

        const { papers, omitted } = await this.fetchAll(ids, options);

        if (papers.length < MIN_COMPARED_PAPERS) {
            throw new UpstreamUnavailableError(
                `Only ${papers.length} of ${ids.length} papers could be fetched; comparison needs at least ${MIN_COMPARED_PAPERS}`
            );
        }

        const claimSets = new Map(papers.map((paper) => [paper.id, extractClaims(paper)] as const));
        if (claimSets.size < MIN_COMPARED_PAPERS) {
            throw new InvalidInputError('Paper IDs to compare resolve to the same paper');
        }

        const comparison = compareClaims(claimSets, {
            overlapThreshold: this.analysis.overlapThreshold,
            extraStopwords: this.analysis.extraStopwords,
        });

        return { papers, comparison, omitted };
    }

    async getCitations(
        paperId: string,
        direction = 'both',
        maxResults = 10,
        options: IndexRequestOptions = {}
    ): Promise<CitationGraph> {
        const id = requireText(paperId, 'Paper ID');
        parseDirection(direction);
        requireCount(maxResults, 'maxResults', 1, MAX_CITATION_RESULTS);

        return this.citationGraph.build(id, direction, maxResults, options);
    }

    /**
     * Search the topic, extract claims from every hit and synthesize a gap report.
     * No search hits gives an empty report.
     */
    async findResearchGaps(
        topic: string,
        maxPapers = 5,
        yearFrom?: number,
        options: IndexRequestOptions = {}
    ): Promise<ResearchGapAnalysis> {
        const text = requireText(topic, 'Topic');
        requireCount(maxPapers, 'maxPapers', MIN_GAP_PAPERS, MAX_GAP_PAPERS);
        requireYear(yearFrom);

        const found = await this.index.search(text, maxPapers, yearFrom, options);
        const papers = uniqueById(found).slice(0, maxPapers);

        if (papers.length === 0) {
            getLogger().info({ topic: text }, 'No papers found for gap analysis');
            return {
                topic: text,
                papers,
                report: { unansweredQuestions: [], limitations: [], contradictions: [], emergingTopics: [] },
            };
        }

        const claimSets = new Map(papers.map((paper) => [paper.id, extractClaims(paper)] as const));
        const years = new Map(papers.map((paper) => [paper.id, paper.year] as const));

        return { topic: text, papers, report: synthesizeGaps(claimSets, years, this.analysis) };
    }

    /**
     * Fetch papers concurrently, keeping the ones that resolve in request order.
     */
    private async fetchAll(
        ids: readonly string[],
        options: IndexRequestOptions
    ): Promise<{ papers: Paper[]; omitted: OmittedPaper[] }> {
        const settled = await Promise.allSettled(ids.map((id) => this.index.getById(id, options)));
        options.signal?.throwIfAborted();

        const papers: Paper[] = [];
        const omitted: OmittedPaper[] = [];

        settled.forEach((result, i) => {
            const paperId = ids[i] ?? '';
            if (result.status === 'fulfilled') {
                papers.push(result.value);
            } else {
                const reason = describeError(result.reason);
                omitted.push({ paperId, reason });
                getLogger().warn({ paperId, reason }, 'Dropping paper that could not be fetched');
            }
        });

        return { papers, omitted };
    }
}

function uniqueById(papers: readonly Paper[]): Paper[] {
    const seen = new Set<string>();
    return papers.filter((paper) => {
        if (seen.has(paper.id)) return false;
        seen.add(paper.id);
        return true;
    });
}
