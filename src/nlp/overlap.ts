import { tokenize } from './tokenizer.js';
import { DIRECTIONAL_TERMS } from './polarity.js';

const NO_EXTRA_STOPWORDS: ReadonlySet<string> = new Set();

/**
 * Significant words of a claim: tokenizer output minus directional vocabulary
 * and any configured extra stopwords. Deduplicated.
 */
export function significantTerms(
    text: string,
    extraStopwords: ReadonlySet<string> = NO_EXTRA_STOPWORDS
): Set<string> {
    return new Set(
        tokenize(text).filter((token) => !DIRECTIONAL_TERMS.has(token) && !extraStopwords.has(token))
    );
}

/**
 * Topic overlap score in [0, 1]: shared significant words divided by the
 * significant-word count of the shorter claim. Empty input scores 0.
 */
export function topicOverlap(termsA: ReadonlySet<string>, termsB: ReadonlySet<string>): number {
    if (termsA.size === 0 || termsB.size === 0) return 0;

    // Iterate the smaller set
    const [smaller, larger] = termsA.size <= termsB.size ? [termsA, termsB] : [termsB, termsA];

    let shared = 0;
    for (const term of smaller) {
        if (larger.has(term)) shared++;
    }

    return shared / smaller.size;
}
