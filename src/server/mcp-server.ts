import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResearchService } from '../service/research-service.js';
import { MAX_CITATION_RESULTS, MAX_SEARCH_RESULTS } from '../service/research-service.js';
import { MAX_COMPARED_PAPERS, MIN_COMPARED_PAPERS } from '../analysis/comparator.js';
import { MAX_GAP_PAPERS, MIN_GAP_PAPERS } from '../analysis/gap-synthesizer.js';
import { CITATION_QUERY_DIRECTIONS } from '../types/index.js';
import { ResearchError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    formatAbstract,
    formatCitationGraph,
    formatClaims,
    formatComparison,
    formatGapAnalysis,
    formatSearchResults,
} from './format.js';

/**
 * Run a tool body, turning pipeline errors into tool-level error results.
 * Anything else is a bug and propagates to the protocol layer.
 */
async function runTool(tool: string, body: () => Promise<string>): Promise<CallToolResult> {
    try {
        return { content: [{ type: 'text', text: await body() }] };
    } catch (error) {
        if (error instanceof ResearchError) {
            getLogger().info({ tool, code: error.code, message: error.message }, 'Tool call rejected');
            return { isError: true, content: [{ type: 'text', text: `${error.code}: ${error.message}` }] };
        }
        getLogger().error({ tool, error }, 'Tool call failed');
        throw error;
    }
}

/**
 * Tool bodies keyed by tool name, independent of the MCP transport.
 */
export function createToolHandlers(service: ResearchService) {
    return {
        search_papers: (
            args: { query: string; max_results: number; year_from?: number },
            signal?: AbortSignal
        ) =>
            runTool('search_papers', async () =>
                formatSearchResults(
                    args.query,
                    await service.searchPapers(args.query, args.max_results, args.year_from, { signal })
                )
            ),

        get_paper_abstract: (args: { paper_id: string }, signal?: AbortSignal) =>
            runTool('get_paper_abstract', async () =>
                formatAbstract(await service.getPaperAbstract(args.paper_id, { signal }))
            ),

        extract_claims: (args: { paper_id: string }, signal?: AbortSignal) =>
            runTool('extract_claims', async () =>
                formatClaims(await service.extractPaperClaims(args.paper_id, { signal }))
            ),

        compare_papers: (args: { paper_ids: string[] }, signal?: AbortSignal) =>
            runTool('compare_papers', async () =>
                formatComparison(await service.comparePapers(args.paper_ids, { signal }))
            ),

        get_citations: (
            args: { paper_id: string; direction: string; max_results: number },
            signal?: AbortSignal
        ) =>
            runTool('get_citations', async () =>
                formatCitationGraph(
                    await service.getCitations(args.paper_id, args.direction, args.max_results, { signal })
                )
            ),

        find_research_gaps: (
            args: { topic: string; max_papers: number; year_from?: number },
            signal?: AbortSignal
        ) =>
            runTool('find_research_gaps', async () =>
                formatGapAnalysis(
                    await service.findResearchGaps(args.topic, args.max_papers, args.year_from, { signal })
                )
            ),
    };
}

/**
 * Build the MCP server exposing the six research tools.
 */
export function createResearchServer(service: ResearchService, version = '1.0.0'): McpServer {
    const server = new McpServer({ name: 'research-mcp', version });
    const handlers = createToolHandlers(service);

    server.tool(
        'search_papers',
        'Search for academic papers on OpenAlex, most cited first.',
        {
            query: z.string().min(1).describe('Research topic or keywords to search for'),
            max_results: z.number().int().min(1).max(MAX_SEARCH_RESULTS).default(5)
                .describe('Maximum number of papers to return'),
            year_from: z.number().int().optional().describe('Only include papers from this year onwards'),
        },
        (args, extra) => handlers.search_papers(args, extra.signal)
    );

    server.tool(
        'get_paper_abstract',
        'Get the full abstract and metadata of a paper.',
        {
            paper_id: z.string().min(1).describe('OpenAlex work ID (e.g. W2741809807) from search_papers'),
        },
        (args, extra) => handlers.get_paper_abstract(args, extra.signal)
    );

    server.tool(
        'extract_claims',
        'Split a paper abstract into research questions, methodology, findings and conclusions.',
        {
            paper_id: z.string().min(1).describe('OpenAlex work ID'),
        },
        (args, extra) => handlers.extract_claims(args, extra.signal)
    );

    server.tool(
        'compare_papers',
        'Compare claims across papers to find agreements, contradictions and open gaps.',
        {
            paper_ids: z.array(z.string().min(1)).min(MIN_COMPARED_PAPERS).max(MAX_COMPARED_PAPERS)
                .describe(`${MIN_COMPARED_PAPERS} to ${MAX_COMPARED_PAPERS} OpenAlex work IDs`),
        },
        (args, extra) => handlers.compare_papers(args, extra.signal)
    );

    server.tool(
        'get_citations',
        'List the papers a paper references and/or the papers citing it.',
        {
            paper_id: z.string().min(1).describe('OpenAlex work ID'),
            direction: z.string().default('both').describe(`One of ${CITATION_QUERY_DIRECTIONS.join(', ')}`),
            max_results: z.number().int().min(1).max(MAX_CITATION_RESULTS).default(10)
                .describe('Maximum papers per direction'),
        },
        (args, extra) => handlers.get_citations(args, extra.signal)
    );

    server.tool(
        'find_research_gaps',
        'Search a topic and report unanswered questions, limitations, contradictions and emerging topics.',
        {
            topic: z.string().min(1).describe('Research topic to analyse'),
            max_papers: z.number().int().min(MIN_GAP_PAPERS).max(MAX_GAP_PAPERS).default(5)
                .describe('Number of papers to analyse'),
            year_from: z.number().int().optional().describe('Only include papers from this year onwards'),
        },
        (args, extra) => handlers.find_research_gaps(args, extra.signal)
    );

    return server;
}

/**
 * Serve the tools over stdio until the client disconnects.
 */
export async function startStdioServer(server: McpServer): Promise<void> {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    getLogger().info('research-mcp server listening on stdio');
}
