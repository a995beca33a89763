import { describe, it, expect } from 'vitest';
import { compareClaims } from '../analysis/comparator.js';
import { extractClaims } from '../analysis/claim-extractor.js';
import type { Claim } from '../types/index.js';
import { InvalidInputError } from '../utils/errors.js';

function claimSets(abstracts: Record<string, string>): Map<string, Claim[]> {
    return new Map(
        Object.entries(abstracts).map(([id, abstract]) => [id, extractClaims({ id, abstract })])
    );
}

describe('Paper Comparator', () => {
    describe('input validation', () => {
        const sets = new Map<string, Claim[]>(
            ['P1', 'P2', 'P3', 'P4', 'P5', 'P6'].map((id) => [id, []])
        );

        it('should reject fewer than two papers', () => {
            expect(() => compareClaims(sets, { paperIds: ['P1'] })).toThrow(InvalidInputError);
        });

        it('should reject more than five papers', () => {
            expect(() => compareClaims(sets)).toThrow(InvalidInputError);
        });

        it('should accept two and five papers', () => {
            expect(compareClaims(sets, { paperIds: ['P1', 'P2'] })).toEqual({
                agreements: [],
                contradictions: [],
                openGaps: [],
            });
            expect(() => compareClaims(sets, { paperIds: ['P1', 'P2', 'P3', 'P4', 'P5'] })).not.toThrow();
        });

        it('should reject repeated and unknown IDs', () => {
            expect(() => compareClaims(sets, { paperIds: ['P1', 'P1'] })).toThrow(InvalidInputError);
            expect(() => compareClaims(sets, { paperIds: ['P1', 'Z9'] })).toThrow('No claims supplied for: Z9');
        });
    });

    describe('alignment', () => {
        it('should report opposite directions on the same topic as a contradiction', () => {
            const result = compareClaims(claimSets({
                A: 'Latency decreased by 40% with caching.',
                B: 'Latency increased by 10% with caching.',
            }));

            expect(result.agreements).toEqual([]);
            expect(result.contradictions).toHaveLength(1);
            expect(result.contradictions[0]?.first.paperId).toBe('A');
            expect(result.contradictions[0]?.second.paperId).toBe('B');
            expect(result.contradictions[0]?.overlap).toBe(1);
        });

        it('should report matching directions as an agreement', () => {
            const result = compareClaims(claimSets({
                A: 'Latency decreased by 40% with caching.',
                B: 'Caching decreased latency by 25%.',
            }));

            expect(result.agreements).toHaveLength(1);
            expect(result.contradictions).toEqual([]);
        });

        it('should ignore claims on unrelated topics', () => {
            const result = compareClaims(claimSets({
                A: 'Latency decreased by 40% with caching.',
                B: 'Energy usage rose 15% on mobile devices.',
            }));

            expect(result.agreements).toEqual([]);
            expect(result.contradictions).toEqual([]);
        });

        it('should require the overlap to exceed the threshold', () => {
            const sets = claimSets({
                A: 'Latency decreased by 40% with caching.',
                B: 'Latency increased by 10% under load.',
            });

            expect(compareClaims(sets).contradictions).toHaveLength(1);
            expect(compareClaims(sets, { overlapThreshold: 0.5 }).contradictions).toEqual([]);
        });

        it('should never pair two claims of the same paper', () => {
            const result = compareClaims(claimSets({
                A: 'Latency decreased by 40% with caching. Latency increased by 10% with caching.',
                B: 'Energy usage rose 15% on mobile devices.',
            }));

            expect(result.contradictions).toEqual([]);
            expect(result.agreements).toEqual([]);
        });

        it('should honour extra stopwords', () => {
            const result = compareClaims(
                claimSets({
                    A: 'Latency decreased by 40% with caching.',
                    B: 'Latency increased by 10% with caching.',
                }),
                { extraStopwords: ['Latency', 'caching'] }
            );

            expect(result.contradictions).toEqual([]);
        });
    });

    describe('open gaps', () => {
        it('should keep questions no other paper answers', () => {
            const result = compareClaims(claimSets({
                A: 'Does caching reduce latency? Latency decreased by 40% with caching.',
                B: 'Energy usage rose 15% on mobile devices.',
            }));

            expect(result.openGaps.map((claim) => claim.text)).toEqual(['Does caching reduce latency?']);
        });

        it('should drop questions another paper answers', () => {
            const result = compareClaims(claimSets({
                A: 'Does caching reduce latency? We use a benchmark suite.',
                B: 'Latency decreased by 40% with caching.',
            }));

            expect(result.openGaps).toEqual([]);
        });
    });
});
