/**
 * Semantic role of one abstract sentence.
 */
export type ClaimKind = 'research_question' | 'methodology' | 'finding' | 'conclusion' | 'unclassified';

export const CLAIM_KINDS: readonly ClaimKind[] = [
    'research_question',
    'methodology',
    'finding',
    'conclusion',
    'unclassified',
];

/**
 * Directional tag attached to finding/conclusion claims.
 * `effect` comes from "significant"-style wording, `no_effect` from its negation.
 */
export type Polarity = 'increase' | 'decrease' | 'positive' | 'negative' | 'effect' | 'no_effect';

/**
 * Claim — one sentence of a paper's abstract with its classified role.
 */
export interface Claim {
    /** ID of the paper the sentence came from (back-reference only) */
    paperId: string;

    /** 0-based sentence position within the abstract */
    index: number;

    kind: ClaimKind;

    /** The source sentence */
    text: string;

    /** Only ever set on finding and conclusion claims */
    polarity?: Polarity;
}
