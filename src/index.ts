/**
 * Library entry point.
 */
export * from './types/index.js';
export { extractClaims, classifySentence, CLASSIFICATION_RULES } from './analysis/claim-extractor.js';
export { compareClaims, MIN_COMPARED_PAPERS, MAX_COMPARED_PAPERS } from './analysis/comparator.js';
export type { ComparisonOptions } from './analysis/comparator.js';
export { synthesizeGaps, MIN_GAP_PAPERS, MAX_GAP_PAPERS } from './analysis/gap-synthesizer.js';
export type { GapSynthesisOptions } from './analysis/gap-synthesizer.js';
export { CitationGraphBuilder, parseDirection } from './graph/citation-graph.js';
export { OpenAlexClient } from './sources/openalex.js';
export type { OpenAlexClientOptions } from './sources/openalex.js';
export { ResearchService } from './service/research-service.js';
export type {
    PaperAbstract,
    PaperClaims,
    PaperComparison,
    ResearchGapAnalysis,
    OmittedPaper,
} from './service/research-service.js';
export { createResearchServer, createToolHandlers, startStdioServer } from './server/mcp-server.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { resolveConfig, mergeConfig } from './utils/config.js';
export type { ConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export {
    ResearchError,
    PaperNotFoundError,
    InvalidInputError,
    UpstreamUnavailableError,
} from './utils/errors.js';
