import { describe, it, expect } from 'vitest';
import * as extractor from '../analysis/claim-extractor.js';
import { CLASSIFICATION_RULES, classifySentence, extractClaims } from '../analysis/claim-extractor.js';
import { splitSentences } from '../nlp/tokenizer.js';

const CACHING_ABSTRACT =
    'Does caching improve latency? We use a benchmark suite. Results show a 40% decrease in latency. Therefore caching is recommended.';

describe('Claim Extractor', () => {
    describe('extractClaims', () => {
        it('should classify each sentence of an abstract', () => {
            const claims = extractClaims({ id: 'W1', abstract: CACHING_ABSTRACT });

            expect(claims.map((claim) => claim.kind)).toEqual([
                'research_question',
                'methodology',
                'finding',
                'conclusion',
            ]);
            expect(claims.map((claim) => claim.index)).toEqual([0, 1, 2, 3]);
            expect(claims.every((claim) => claim.paperId === 'W1')).toBe(true);
        });

        it('should tag findings with their direction', () => {
            const claims = extractClaims({ id: 'W1', abstract: CACHING_ABSTRACT });

            expect(claims[2]).toEqual({
                paperId: 'W1',
                index: 2,
                kind: 'finding',
                text: 'Results show a 40% decrease in latency.',
                polarity: 'decrease',
            });
            expect(claims[3]?.polarity).toBeUndefined();
            expect(claims[0]).not.toHaveProperty('polarity');
        });

        it('should yield exactly one claim per sentence', () => {
            const abstract = 'A first remark. Is this a question? Another statement here! And a trailing fragment';
            const claims = extractClaims({ id: 'W2', abstract });

            expect(claims).toHaveLength(splitSentences(abstract).length);
            expect(claims.map((claim) => claim.text)).toEqual(splitSentences(abstract));
        });

        it('should return no claims without an abstract', () => {
            expect(extractClaims({ id: 'W3', abstract: null })).toEqual([]);
            expect(extractClaims({ id: 'W3', abstract: '' })).toEqual([]);
        });

        it('should be deterministic', () => {
            const paper = { id: 'W1', abstract: CACHING_ABSTRACT };
            expect(extractClaims(paper)).toEqual(extractClaims(paper));
        });

        it('should not tag methodology claims with a polarity', () => {
            const [claim] = extractClaims({ id: 'W4', abstract: 'We use a dataset and find a 12% improvement.' });
            expect(claim?.kind).toBe('methodology');
            expect(claim?.polarity).toBeUndefined();
        });

        it('should read negated significance as no effect', () => {
            const [claim] = extractClaims({
                id: 'W5',
                abstract: 'We find no significant difference in accuracy. Deployment details follow.',
            });
            expect(claim?.kind).toBe('finding');
            expect(claim?.polarity).toBe('no_effect');
        });
    });

    describe('classifySentence', () => {
        it('should expose the decision table, not its cue lists', () => {
            expect(Object.keys(extractor).sort()).toEqual(['CLASSIFICATION_RULES', 'classifySentence', 'extractClaims']);
        });

        it('should apply the rules in priority order', () => {
            expect(CLASSIFICATION_RULES.map((rule) => rule.kind)).toEqual([
                'research_question',
                'methodology',
                'finding',
                'conclusion',
            ]);
        });

        it('should recognize question cues without a question mark', () => {
            expect(classifySentence('An open question is how caches age.')).toBe('research_question');
        });

        it('should detect numeric effects', () => {
            expect(classifySentence('Throughput grew 3-fold under load.')).toBe('finding');
            expect(classifySentence('The gain held at p < 0.05 across sites.')).toBe('finding');
        });

        it('should treat the last sentence as a conclusion', () => {
            expect(classifySentence('Caching is widely deployed.')).toBe('unclassified');
            expect(classifySentence('Caching is widely deployed.', { isLast: true })).toBe('conclusion');
        });

        it('should prefer a finding cue over a conclusion cue', () => {
            expect(classifySentence('Overall, results show a 12% gain.')).toBe('finding');
        });
    });
});
