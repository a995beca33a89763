/**
 * Shared utilities for the OpenAlex client.
 */

const OPENALEX_ID_PREFIX = /^https?:\/\/openalex\.org\//i;

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * This function reconstructs the original text.
 *
 * @param invertedIndex - The inverted index object or null
 * @returns Reconstructed abstract text or null
 */
export function invertedIndexToText(
    invertedIndex: Record<string, number[]> | null | undefined
): string | null {
    if (!invertedIndex || typeof invertedIndex !== 'object') {
        return null;
    }

    const words: Array<[number, string]> = [];

    for (const [word, positions] of Object.entries(invertedIndex)) {
        if (!Array.isArray(positions)) continue;
        for (const pos of positions) {
            if (typeof pos === 'number' && pos >= 0) {
                words.push([pos, word]);
            }
        }
    }

    if (words.length === 0) return null;

    // Sort by position
    words.sort((a, b) => a[0] - b[0]);

    return words.map(([, word]) => word).join(' ');
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * Short OpenAlex work ID from either form.
 * "https://openalex.org/W2741809807" → "W2741809807"
 * Anything else (short IDs, DOIs) is returned trimmed.
 */
export function normalizeWorkId(id: string): string {
    return id.trim().replace(OPENALEX_ID_PREFIX, '');
}
