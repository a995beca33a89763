import type { Claim } from './claim.js';

/**
 * Two claims from different papers judged to address the same topic.
 */
export interface ClaimPair {
    first: Claim;
    second: Claim;
    /** Topic overlap score in [0, 1] */
    overlap: number;
}

/**
 * Output of comparing the claim sets of 2–5 papers.
 */
export interface ComparisonResult {
    agreements: ClaimPair[];
    contradictions: ClaimPair[];
    /** Research questions with no overlapping finding in any other compared paper */
    openGaps: Claim[];
}

/**
 * Keyword cluster built from conclusion claims of several papers.
 */
export interface EmergingTopic {
    keywords: string[];
    paperIds: string[];
    claims: Claim[];
    /** Mean publication year of the contributing papers with a known year */
    meanYear: number | null;
}

/**
 * Research-gap report aggregated across up to 10 papers.
 */
export interface GapReport {
    unansweredQuestions: Claim[];
    limitations: Claim[];
    contradictions: ClaimPair[];
    emergingTopics: EmergingTopic[];
}

/** Paper ID → claims extracted from its abstract, in sentence order */
export type ClaimSets = ReadonlyMap<string, readonly Claim[]>;
