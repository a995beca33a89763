import type { AnalysisConfig, Claim, ClaimSets, EmergingTopic, GapReport } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { InvalidInputError } from '../utils/errors.js';
import { alignClaims, findOpenQuestions, tagClaims, type TaggedClaim } from './comparator.js';

export const MIN_GAP_PAPERS = 1;
export const MAX_GAP_PAPERS = 10;

export type GapSynthesisOptions = Partial<AnalysisConfig>;

/**
 * Synthesize a research-gap report across 1–10 papers.
 *
 * - unanswered questions: research questions no finding in the set overlaps,
 *   the asking paper's own findings included
 * - limitations: methodology/conclusion claims containing a limitation cue
 * - contradictions: the comparator's pairwise alignment over every paper pair
 * - emerging topics: conclusion keyword clusters, newest first
 *
 * @param years - Publication year per paper ID; unknown years are ignored when averaging
 * @throws InvalidInputError outside the 1–10 paper range
 */
export function synthesizeGaps(
    claimSets: ClaimSets,
    years: ReadonlyMap<string, number | null>,
    options: GapSynthesisOptions = {}
): GapReport {
    const settings = { ...DEFAULT_CONFIG.analysis, ...options };
    const paperIds = [...claimSets.keys()];

    if (paperIds.length < MIN_GAP_PAPERS || paperIds.length > MAX_GAP_PAPERS) {
        throw new InvalidInputError(
            `Gap analysis needs between ${MIN_GAP_PAPERS} and ${MAX_GAP_PAPERS} papers, got ${paperIds.length}`
        );
    }

    const tagged = tagClaims(claimSets, paperIds, settings.extraStopwords);

    return {
        unansweredQuestions: findOpenQuestions(tagged, settings.overlapThreshold, true),
        limitations: collectLimitations(tagged, settings.limitationCues),
        contradictions: alignClaims(tagged, settings.overlapThreshold).contradictions,
        emergingTopics: clusterEmergingTopics(tagged, years, settings.minTopicPapers).slice(
            0,
            settings.maxEmergingTopics
        ),
    };
}

function collectLimitations(tagged: readonly TaggedClaim[], cues: readonly string[]): Claim[] {
    const lowerCues = cues.map((cue) => cue.toLowerCase());

    return tagged
        .map(({ claim }) => claim)
        .filter((claim) => claim.kind === 'methodology' || claim.kind === 'conclusion')
        .filter((claim) => {
            const text = claim.text.toLowerCase();
            return lowerCues.some((cue) => text.includes(cue));
        });
}

/**
 * Group conclusion claims by shared significant keyword. A keyword needs
 * conclusions from `minPapers` distinct papers; keywords backed by exactly the
 * same claims collapse into one cluster.
 */
function clusterEmergingTopics(
    tagged: readonly TaggedClaim[],
    years: ReadonlyMap<string, number | null>,
    minPapers: number
): EmergingTopic[] {
    const byKeyword = new Map<string, TaggedClaim[]>();

    for (const entry of tagged) {
        if (entry.claim.kind !== 'conclusion') continue;
        for (const term of entry.terms) {
            const members = byKeyword.get(term) ?? [];
            members.push(entry);
            byKeyword.set(term, members);
        }
    }

    const clusters = new Map<string, EmergingTopic>();
    const keywords = [...byKeyword.keys()].sort();

    for (const keyword of keywords) {
        const members = byKeyword.get(keyword) ?? [];
        const paperIds = [...new Set(members.map((member) => member.paperId))];
        if (paperIds.length < minPapers) continue;

        const signature = members.map((member) => `${member.paperId}#${member.claim.index}`).join('|');
        const existing = clusters.get(signature);
        if (existing) {
            existing.keywords.push(keyword);
            continue;
        }

        clusters.set(signature, {
            keywords: [keyword],
            paperIds,
            claims: members.map((member) => member.claim),
            meanYear: meanYear(paperIds, years),
        });
    }

    return [...clusters.values()].sort(compareTopics);
}

function meanYear(paperIds: readonly string[], years: ReadonlyMap<string, number | null>): number | null {
    const known = paperIds
        .map((id) => years.get(id))
        .filter((year): year is number => typeof year === 'number');

    if (known.length === 0) return null;
    return known.reduce((sum, year) => sum + year, 0) / known.length;
}

/**
 * Newest mean year first (unknown last), then more papers, then keyword order.
 */
function compareTopics(a: EmergingTopic, b: EmergingTopic): number {
    if (a.meanYear !== b.meanYear) {
        if (a.meanYear === null) return 1;
        if (b.meanYear === null) return -1;
        return b.meanYear - a.meanYear;
    }
    if (a.paperIds.length !== b.paperIds.length) {
        return b.paperIds.length - a.paperIds.length;
    }
    return (a.keywords[0] ?? '').localeCompare(b.keywords[0] ?? '');
}
