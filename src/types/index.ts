/**
 * Barrel export for all shared types.
 */
export type { Paper } from './paper.js';
export { CLAIM_KINDS } from './claim.js';
export type { Claim, ClaimKind, Polarity } from './claim.js';
export { CITATION_QUERY_DIRECTIONS } from './citation.js';
export type {
    CitationDirection,
    CitationQueryDirection,
    CitationNode,
    CitationEdge,
    CitationGraph,
} from './citation.js';
export type { ClaimPair, ComparisonResult, EmergingTopic, GapReport, ClaimSets } from './analysis.js';
export { DEFAULT_CONFIG, DEFAULT_LIMITATION_CUES } from './config.js';
export type { ResearchConfig, LogLevel, HttpConfig, AnalysisConfig, OpenAlexConfig } from './config.js';
export type { PaperIndexClient, IndexRequestOptions } from './paper-index.js';
