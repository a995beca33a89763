import type { Claim, ClaimPair, ClaimSets, ComparisonResult } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { significantTerms, topicOverlap } from '../nlp/overlap.js';
import { isOpposite } from '../nlp/polarity.js';
import { InvalidInputError } from '../utils/errors.js';

export const MIN_COMPARED_PAPERS = 2;
export const MAX_COMPARED_PAPERS = 5;

/**
 * Overlap tuning shared by the comparator and the gap synthesizer.
 */
export interface OverlapOptions {
    overlapThreshold?: number;
    extraStopwords?: readonly string[];
}

export interface ComparisonOptions extends OverlapOptions {
    /** Papers to compare; defaults to every key of the claim sets */
    paperIds?: readonly string[];
}

/**
 * Claim tagged with the paper it was filed under and its significant words.
 */
export interface TaggedClaim {
    paperId: string;
    claim: Claim;
    terms: ReadonlySet<string>;
}

/**
 * Flatten claim sets into one sequence, paper by paper, sentence order preserved.
 */
export function tagClaims(
    claimSets: ClaimSets,
    paperIds: readonly string[],
    extraStopwords: readonly string[] = []
): TaggedClaim[] {
    const extra = new Set(extraStopwords.map((word) => word.toLowerCase()));
    const tagged: TaggedClaim[] = [];

    for (const paperId of paperIds) {
        for (const claim of claimSets.get(paperId) ?? []) {
            tagged.push({ paperId, claim, terms: significantTerms(claim.text, extra) });
        }
    }

    return tagged;
}

/**
 * Pair every finding/conclusion claim with those of the other papers and keep
 * the pairs whose topic overlap exceeds the threshold. Opposite polarities make
 * a contradiction, anything else an agreement.
 */
export function alignClaims(
    tagged: readonly TaggedClaim[],
    threshold: number
): Pick<ComparisonResult, 'agreements' | 'contradictions'> {
    const comparable = tagged.filter(
        ({ claim }) => claim.kind === 'finding' || claim.kind === 'conclusion'
    );
    const agreements: ClaimPair[] = [];
    const contradictions: ClaimPair[] = [];

    for (let i = 0; i < comparable.length; i++) {
        const a = comparable[i];
        if (!a) continue;

        for (let j = i + 1; j < comparable.length; j++) {
            const b = comparable[j];
            if (!b || b.paperId === a.paperId) continue;

            const overlap = topicOverlap(a.terms, b.terms);
            if (overlap <= threshold) continue;

            const pair: ClaimPair = { first: a.claim, second: b.claim, overlap };
            if (isOpposite(a.claim.polarity, b.claim.polarity)) {
                contradictions.push(pair);
            } else {
                agreements.push(pair);
            }
        }
    }

    return { agreements, contradictions };
}

/**
 * Research questions with no topically overlapping finding.
 * With `includeOwnPaper` false only the other papers' findings can answer a question.
 */
export function findOpenQuestions(
    tagged: readonly TaggedClaim[],
    threshold: number,
    includeOwnPaper: boolean
): Claim[] {
    const findings = tagged.filter(({ claim }) => claim.kind === 'finding');

    return tagged
        .filter(({ claim }) => claim.kind === 'research_question')
        .filter((question) =>
            !findings.some((finding) =>
                (includeOwnPaper || finding.paperId !== question.paperId) &&
                topicOverlap(question.terms, finding.terms) > threshold
            )
        )
        .map(({ claim }) => claim);
}

/**
 * Compare the claim sets of 2–5 distinct papers.
 *
 * @throws InvalidInputError for fewer than 2 or more than 5 papers, repeated
 *   IDs, or an ID without a claim set
 */
export function compareClaims(claimSets: ClaimSets, options: ComparisonOptions = {}): ComparisonResult {
    const paperIds = options.paperIds ?? [...claimSets.keys()];
    const threshold = options.overlapThreshold ?? DEFAULT_CONFIG.analysis.overlapThreshold;

    if (paperIds.length < MIN_COMPARED_PAPERS || paperIds.length > MAX_COMPARED_PAPERS) {
        throw new InvalidInputError(
            `Comparison needs between ${MIN_COMPARED_PAPERS} and ${MAX_COMPARED_PAPERS} papers, got ${paperIds.length}`
        );
    }
    if (new Set(paperIds).size !== paperIds.length) {
        throw new InvalidInputError('Paper IDs to compare must be distinct');
    }
    const missing = paperIds.filter((id) => !claimSets.has(id));
    if (missing.length > 0) {
        throw new InvalidInputError(`No claims supplied for: ${missing.join(', ')}`);
    }

    const tagged = tagClaims(claimSets, paperIds, options.extraStopwords);

    return {
        ...alignClaims(tagged, threshold),
        openGaps: findOpenQuestions(tagged, threshold, false),
    };
}
