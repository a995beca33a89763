import type { CitationGraph, Claim, ClaimKind, ClaimPair, Paper } from '../types/index.js';
import { CLAIM_KINDS } from '../types/index.js';
import type {
    PaperAbstract,
    PaperClaims,
    PaperComparison,
    ResearchGapAnalysis,
} from '../service/research-service.js';

/**
 * Markdown renderers for tool output. Each returns the text block an assistant reads.
 */

const MAX_LISTED_AUTHORS = 5;

const KIND_HEADINGS: Readonly<Record<ClaimKind, string>> = {
    research_question: 'Research questions',
    methodology: 'Methodology',
    finding: 'Findings',
    conclusion: 'Conclusions',
    unclassified: 'Other statements',
};

export function formatAuthors(authors: readonly string[]): string {
    if (authors.length === 0) return 'Unknown';
    const listed = authors.slice(0, MAX_LISTED_AUTHORS).join(', ');
    return authors.length > MAX_LISTED_AUTHORS ? `${listed} et al.` : listed;
}

function formatYear(year: number | null): string {
    return year === null ? 'Unknown' : String(year);
}

function formatClaim(claim: Claim): string {
    const polarity = claim.polarity ? ` _(polarity: ${claim.polarity})_` : '';
    return `[${claim.paperId}] ${claim.text}${polarity}`;
}

function formatPair(pair: ClaimPair): string {
    return `- ${formatClaim(pair.first)}\n  vs ${formatClaim(pair.second)} (overlap ${pair.overlap.toFixed(2)})`;
}

function section(title: string, lines: readonly string[]): string {
    const body = lines.length > 0 ? lines.join('\n') : 'None found.';
    return `### ${title} (${lines.length})\n${body}\n`;
}

export function formatSearchResults(query: string, papers: readonly Paper[]): string {
    if (papers.length === 0) {
        return `No papers found for query: ${query}`;
    }

    let result = `Found ${papers.length} papers for '${query}':\n\n`;

    papers.forEach((paper, i) => {
        result += `${i + 1}. **${paper.title}**\n`;
        result += `   Authors: ${formatAuthors(paper.authors)}\n`;
        result += `   Year: ${formatYear(paper.year)}\n`;
        result += `   Citations: ${paper.citedByCount}\n`;
        result += `   URL: ${paper.url ?? 'n/a'}\n`;
        result += `   ID: ${paper.id}\n\n`;
    });

    return result;
}

export function formatAbstract({ paper, abstract }: PaperAbstract): string {
    let result = `**${paper.title}**\n`;
    result += `Authors: ${formatAuthors(paper.authors)}\n`;
    result += `Year: ${formatYear(paper.year)}\n`;
    result += `Citations: ${paper.citedByCount}\n\n`;
    result += `**Abstract:**\n${abstract ?? 'No abstract available'}\n`;
    return result;
}

export function formatClaims({ paper, claims }: PaperClaims): string {
    if (claims.length === 0) {
        return 'Cannot extract claims: No abstract available for this paper';
    }

    let result = `**Paper:** ${paper.title}\n`;
    result += `**Authors:** ${formatAuthors(paper.authors)}\n`;
    result += `**Year:** ${formatYear(paper.year)}\n\n`;

    for (const kind of CLAIM_KINDS) {
        const ofKind = claims.filter((claim) => claim.kind === kind);
        if (ofKind.length === 0) continue;

        result += `### ${KIND_HEADINGS[kind]}\n`;
        for (const claim of ofKind) {
            const polarity = claim.polarity ? ` _(polarity: ${claim.polarity})_` : '';
            result += `${claim.index + 1}. ${claim.text}${polarity}\n`;
        }
        result += '\n';
    }

    return result;
}

export function formatComparison({ papers, comparison, omitted }: PaperComparison): string {
    let result = `Compared ${papers.length} papers:\n`;
    for (const paper of papers) {
        result += `- ${paper.id}: ${paper.title} (${formatYear(paper.year)})\n`;
    }
    if (omitted.length > 0) {
        result += `Omitted: ${omitted.map((entry) => `${entry.paperId} (${entry.reason})`).join(', ')}\n`;
    }
    result += '\n';

    result += section('Agreements', comparison.agreements.map(formatPair)) + '\n';
    result += section('Contradictions', comparison.contradictions.map(formatPair)) + '\n';
    result += section('Open gaps', comparison.openGaps.map((claim) => `- ${formatClaim(claim)}`));

    return result;
}

export function formatCitationGraph(graph: CitationGraph): string {
    let result = `Citation graph for ${graph.rootId}: ${graph.nodes.length} papers, ${graph.edges.length} links\n`;
    if (graph.omitted.length > 0) {
        result += `Omitted (fetch failed): ${graph.omitted.join(', ')}\n`;
    }
    result += '\n';

    result += section('Papers', graph.nodes.map((node) => `- ${node.id}: ${node.title} (${formatYear(node.year)})`)) + '\n';
    result += section('Links', graph.edges.map((edge) => `- ${edge.from} → ${edge.to} (${edge.direction})`));

    return result;
}

export function formatGapAnalysis({ topic, papers, report }: ResearchGapAnalysis): string {
    if (papers.length === 0) {
        return `No papers found for topic: ${topic}`;
    }

    let result = `Research gap analysis for '${topic}' across ${papers.length} papers:\n`;
    for (const paper of papers) {
        result += `- ${paper.id}: ${paper.title} (${formatYear(paper.year)})\n`;
    }
    result += '\n';

    const topics = report.emergingTopics.map((topicCluster, i) => {
        const year = topicCluster.meanYear === null ? 'unknown' : topicCluster.meanYear.toFixed(1);
        return `${i + 1}. ${topicCluster.keywords.join(', ')} (papers: ${topicCluster.paperIds.join(', ')}; mean year ${year})`;
    });

    result += section('Unanswered questions', report.unansweredQuestions.map((claim) => `- ${formatClaim(claim)}`)) + '\n';
    result += section('Limitations', report.limitations.map((claim) => `- ${formatClaim(claim)}`)) + '\n';
    result += section('Contradictions', report.contradictions.map(formatPair)) + '\n';
    result += section('Emerging topics', topics);

    return result;
}
