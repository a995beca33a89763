import type { Polarity } from '../types/index.js';

/**
 * Directional vocabulary, scanned in order; the first polarity with a matching
 * phrase wins. `no_effect` is checked before `effect` so that
 * "no significant difference" is not read as an effect.
 */
export const POLARITY_LEXICON: ReadonlyArray<{ polarity: Polarity; phrases: readonly string[] }> = [
    {
        polarity: 'no_effect',
        phrases: [
            'no effect', 'no significant', 'not significant', 'not significantly', 'no difference',
            'no change', 'no impact', 'no association', 'did not affect', 'did not change',
            'did not improve', 'had no', 'has no',
        ],
    },
    {
        polarity: 'increase',
        phrases: [
            'increase', 'increased', 'increases', 'increasing', 'higher', 'improve', 'improved',
            'improves', 'improvement', 'improvements', 'rise', 'rises', 'rose', 'gain', 'gains',
            'boost', 'boosts', 'boosted', 'greater', 'grew', 'growth',
        ],
    },
    {
        polarity: 'decrease',
        phrases: [
            'decrease', 'decreased', 'decreases', 'decreasing', 'lower', 'lowered', 'reduce',
            'reduced', 'reduces', 'reduction', 'reductions', 'decline', 'declined', 'declines',
            'drop', 'dropped', 'drops', 'fewer', 'less', 'diminished',
        ],
    },
    {
        polarity: 'positive',
        phrases: ['positive', 'positively', 'beneficial', 'benefit', 'benefits', 'effective'],
    },
    {
        polarity: 'negative',
        phrases: ['negative', 'negatively', 'harmful', 'detrimental', 'adverse', 'adversely', 'worse'],
    },
    {
        polarity: 'effect',
        phrases: ['significant', 'significantly'],
    },
];

const OPPOSITES: Readonly<Record<Polarity, Polarity>> = {
    increase: 'decrease',
    decrease: 'increase',
    positive: 'negative',
    negative: 'positive',
    effect: 'no_effect',
    no_effect: 'effect',
};

/**
 * Single-word directional terms. Topic overlap ignores them so that two claims
 * are not matched merely for both saying "increased".
 */
export const DIRECTIONAL_TERMS: ReadonlySet<string> = new Set(
    POLARITY_LEXICON
        .filter((entry) => entry.polarity !== 'no_effect')
        .flatMap((entry) => entry.phrases)
);

/**
 * Lowercase, strip punctuation and pad with spaces so phrases match on word boundaries.
 */
function normalizeForPhrases(text: string): string {
    return ` ${text.toLowerCase().replace(/[^a-z0-9\s]/g, ' ').replace(/\s+/g, ' ').trim()} `;
}

/**
 * Directional polarity of a sentence, or undefined when it has no directional language.
 */
export function detectPolarity(text: string): Polarity | undefined {
    const normalized = normalizeForPhrases(text);

    for (const { polarity, phrases } of POLARITY_LEXICON) {
        if (phrases.some((phrase) => normalized.includes(` ${phrase} `))) {
            return polarity;
        }
    }

    return undefined;
}

/**
 * True when both polarities are present and point in opposite directions.
 */
export function isOpposite(a: Polarity | undefined, b: Polarity | undefined): boolean {
    return a !== undefined && b !== undefined && OPPOSITES[a] === b;
}
