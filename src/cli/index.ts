#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { describeError, ResearchError } from '../utils/errors.js';
import { OpenAlexClient } from '../sources/openalex.js';
import { ResearchService } from '../service/research-service.js';
import { createResearchServer, startStdioServer } from '../server/mcp-server.js';
import {
    formatAbstract,
    formatCitationGraph,
    formatClaims,
    formatComparison,
    formatGapAnalysis,
    formatSearchResults,
} from '../server/format.js';

const VERSION = '1.0.0';

interface CommonOptions {
    logLevel?: string;
    jsonLogs?: boolean;
    json?: boolean;
    email?: string;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

/**
 * Resolve config from CLI flags, initialise logging and wire the service.
 */
async function setup(opts: CommonOptions): Promise<ResearchService> {
    const overrides: ConfigOverrides = {};
    if (opts.logLevel !== undefined) {
        if (!isLogLevel(opts.logLevel)) {
            throw new InvalidArgumentError(`Invalid log level: ${opts.logLevel}`);
        }
        overrides.logLevel = opts.logLevel;
    }
    if (opts.jsonLogs) overrides.jsonLogs = true;
    if (opts.email) overrides.openalex = { email: opts.email };

    const config = await resolveConfig(overrides);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const httpClient = createHttpClient({ ...config.http, version: VERSION, email: config.openalex.email });
    const index = new OpenAlexClient({ ...config.openalex, httpClient });
    return new ResearchService(index, config.analysis);
}

/**
 * Run one operation and print its result, Markdown by default or JSON with --json.
 */
async function run<T>(
    opts: CommonOptions,
    operation: (service: ResearchService) => Promise<T>,
    render: (result: T) => string
): Promise<void> {
    try {
        const service = await setup(opts);
        const result = await operation(service);
        console.log(opts.json ? JSON.stringify(result, null, 2) : render(result));
    } catch (error) {
        if (error instanceof ResearchError) {
            console.error(`${error.code}: ${error.message}`);
        } else {
            getLogger().error({ error: describeError(error) }, 'Command failed');
        }
        process.exit(1);
    }
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--json', 'Print raw JSON instead of Markdown', false)
        .option('--email <email>', 'Contact email for the OpenAlex polite pool')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs', false);
}

const program = new Command();

program
    .name('research-mcp')
    .description('Query OpenAlex and reason over paper abstracts: claims, comparisons, citations and research gaps.')
    .version(VERSION);

// ─── SERVE command ────────────────────────────────────────

program
    .command('serve')
    .description('Serve the research tools over MCP stdio')
    .option('--email <email>', 'Contact email for the OpenAlex polite pool')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs', false)
    .action(async (opts: CommonOptions) => {
        try {
            const service = await setup(opts);
            await startStdioServer(createResearchServer(service, VERSION));
        } catch (error) {
            getLogger().error({ error: describeError(error) }, 'Server failed to start');
            process.exit(1);
        }
    });

// ─── Operation commands ───────────────────────────────────

withCommonOptions(
    program
        .command('search')
        .description('Search papers by keywords')
        .argument('<query>', 'Research topic or keywords')
        .option('-m, --max-results <n>', 'Maximum papers to return', parseInteger, 5)
        .option('--year-from <year>', 'Only papers from this year onwards', parseInteger)
).action(async (query: string, opts: CommonOptions & { maxResults: number; yearFrom?: number }) => {
    await run(
        opts,
        (service) => service.searchPapers(query, opts.maxResults, opts.yearFrom),
        (papers) => formatSearchResults(query, papers)
    );
});

withCommonOptions(
    program
        .command('abstract')
        .description('Show a paper abstract')
        .argument('<paperId>', 'OpenAlex work ID')
).action(async (paperId: string, opts: CommonOptions) => {
    await run(opts, (service) => service.getPaperAbstract(paperId), formatAbstract);
});

withCommonOptions(
    program
        .command('claims')
        .description('Extract typed claims from a paper abstract')
        .argument('<paperId>', 'OpenAlex work ID')
).action(async (paperId: string, opts: CommonOptions) => {
    await run(opts, (service) => service.extractPaperClaims(paperId), formatClaims);
});

withCommonOptions(
    program
        .command('compare')
        .description('Compare claims across 2–5 papers')
        .argument('<paperIds...>', 'OpenAlex work IDs')
).action(async (paperIds: string[], opts: CommonOptions) => {
    await run(opts, (service) => service.comparePapers(paperIds), formatComparison);
});

withCommonOptions(
    program
        .command('citations')
        .description('Build the citation neighborhood of a paper')
        .argument('<paperId>', 'OpenAlex work ID')
        .option('-d, --direction <direction>', 'cited_by | references | both', 'both')
        .option('-m, --max-results <n>', 'Maximum papers per direction', parseInteger, 10)
).action(async (paperId: string, opts: CommonOptions & { direction: string; maxResults: number }) => {
    await run(
        opts,
        (service) => service.getCitations(paperId, opts.direction, opts.maxResults),
        formatCitationGraph
    );
});

withCommonOptions(
    program
        .command('gaps')
        .description('Find research gaps across the top papers of a topic')
        .argument('<topic>', 'Research topic')
        .option('-m, --max-papers <n>', 'Number of papers to analyse (1–10)', parseInteger, 5)
        .option('--year-from <year>', 'Only papers from this year onwards', parseInteger)
).action(async (topic: string, opts: CommonOptions & { maxPapers: number; yearFrom?: number }) => {
    await run(
        opts,
        (service) => service.findResearchGaps(topic, opts.maxPapers, opts.yearFrom),
        formatGapAnalysis
    );
});

await program.parseAsync();
