import type { Claim, ClaimKind, Paper } from '../types/index.js';
import { splitSentences } from '../nlp/tokenizer.js';
import { detectPolarity } from '../nlp/polarity.js';

/**
 * Position information a rule may look at besides the sentence text.
 */
export interface SentenceContext {
    /** Sentence is the last one of the abstract */
    isLast: boolean;
}

/**
 * One row of the classification decision table.
 */
export interface ClassificationRule {
    kind: Exclude<ClaimKind, 'unclassified'>;
    matches(sentence: string, context: SentenceContext): boolean;
}

const QUESTION_CUES: readonly string[] = [
    'we ask', 'open question', 'remains unclear', 'remains unknown', 'is unclear',
    'little is known', 'not well understood',
];

const METHODOLOGY_CUES: readonly string[] = [
    'we use', 'we employ', 'we apply', 'method', 'approach', 'dataset', 'experiment',
    'we propose', 'we develop', 'framework', 'we conducted', 'survey of',
];

const FINDING_CUES: readonly string[] = [
    'we find', 'we found', 'results show', 'results indicate', 'results suggest',
    'demonstrates', 'indicates', 'reveals', 'we observe', 'outperforms',
];

const CONCLUSION_CUES: readonly string[] = [
    'in conclusion', 'therefore', 'overall', 'we conclude', 'thus', 'in summary',
    'we recommend', 'implications',
];

/** Percentages, fold changes and p-values */
const NUMERIC_EFFECT = /\d+(?:\.\d+)?\s*(?:%|percent\b|-?fold\b|x\b)|\bp\s*[<=>≤]\s*0?\.\d+/i;

function containsCue(sentence: string, cues: readonly string[]): boolean {
    const lower = sentence.toLowerCase();
    return cues.some((cue) => lower.includes(cue));
}

/**
 * Classification rules in priority order. The first matching rule wins, so a
 * sentence with both methodology and finding cues is a methodology claim.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        kind: 'research_question',
        matches: (sentence) => sentence.endsWith('?') || containsCue(sentence, QUESTION_CUES),
    },
    {
        kind: 'methodology',
        matches: (sentence) => containsCue(sentence, METHODOLOGY_CUES),
    },
    {
        kind: 'finding',
        matches: (sentence) => containsCue(sentence, FINDING_CUES) || NUMERIC_EFFECT.test(sentence),
    },
    {
        kind: 'conclusion',
        matches: (sentence, context) => context.isLast || containsCue(sentence, CONCLUSION_CUES),
    },
];

/**
 * Classify a single sentence with the decision table.
 */
export function classifySentence(sentence: string, context: SentenceContext = { isLast: false }): ClaimKind {
    return CLASSIFICATION_RULES.find((rule) => rule.matches(sentence, context))?.kind ?? 'unclassified';
}

/**
 * Turn a paper's abstract into one claim per sentence, in sentence order.
 * A missing or empty abstract yields no claims.
 */
export function extractClaims(paper: Pick<Paper, 'id' | 'abstract'>): Claim[] {
    const sentences = splitSentences(paper.abstract);

    return sentences.map((text, index) => {
        const kind = classifySentence(text, { isLast: index === sentences.length - 1 });
        const claim: Claim = { paperId: paper.id, index, kind, text };

        if (kind === 'finding' || kind === 'conclusion') {
            const polarity = detectPolarity(text);
            if (polarity) claim.polarity = polarity;
        }

        return claim;
    });
}
