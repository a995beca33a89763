import { describe, it, expect } from 'vitest';
import { synthesizeGaps } from '../analysis/gap-synthesizer.js';
import { extractClaims } from '../analysis/claim-extractor.js';
import type { Claim } from '../types/index.js';
import { InvalidInputError } from '../utils/errors.js';

function claimSets(abstracts: Record<string, string>): Map<string, Claim[]> {
    return new Map(
        Object.entries(abstracts).map(([id, abstract]) => [id, extractClaims({ id, abstract })])
    );
}

const TOPIC_ABSTRACTS = {
    P1: 'Overall, caching remains essential for edge networks.',
    P2: 'Therefore caching strategies must adapt to edge workloads.',
    P3: 'We conclude that federated learning suits edge devices.',
    P4: 'Overall, federated learning needs better privacy.',
};

const TOPIC_YEARS = new Map<string, number | null>([
    ['P1', 2018],
    ['P2', 2022],
    ['P3', 2023],
    ['P4', 2024],
]);

describe('Gap Synthesizer', () => {
    it('should reject empty and oversized paper sets', () => {
        expect(() => synthesizeGaps(new Map(), new Map())).toThrow(InvalidInputError);

        const eleven = new Map<string, Claim[]>(
            Array.from({ length: 11 }, (_, i): [string, Claim[]] => [`P${i}`, []])
        );
        expect(() => synthesizeGaps(eleven, new Map())).toThrow(InvalidInputError);
    });

    it('should return an empty report for a single paper without questions', () => {
        const report = synthesizeGaps(
            claimSets({ A: 'We use a benchmark suite. Results show a 40% decrease in latency.' }),
            new Map([['A', 2021]])
        );

        expect(report).toEqual({
            unansweredQuestions: [],
            limitations: [],
            contradictions: [],
            emergingTopics: [],
        });
    });

    describe('unanswered questions', () => {
        it('should count the asking paper\'s own findings as answers', () => {
            const report = synthesizeGaps(
                claimSets({
                    A: 'Does caching improve latency? We use a benchmark suite. Results show a 40% decrease in latency. Therefore caching is recommended.',
                }),
                new Map()
            );

            expect(report.unansweredQuestions).toEqual([]);
        });

        it('should treat a finding sharing enough keywords as an answer', () => {
            const report = synthesizeGaps(
                claimSets({
                    A: 'Can batching help energy use? Latency decreased by 40% with caching.',
                    B: 'Energy usage rose 15% on mobile devices.',
                }),
                new Map()
            );

            expect(report.unansweredQuestions.map((claim) => claim.text)).toEqual([]);
        });

        it('should report a question without related findings', () => {
            const report = synthesizeGaps(
                claimSets({
                    A: 'Does batching help compilers? Latency decreased by 40% with caching.',
                }),
                new Map()
            );

            expect(report.unansweredQuestions.map((claim) => claim.text)).toEqual([
                'Does batching help compilers?',
            ]);
        });
    });

    it('should collect limitations from methodology and conclusion claims', () => {
        const report = synthesizeGaps(
            claimSets({
                A: 'We use a benchmark suite limited to x86 servers. Results show a 40% decrease limited to cold caches. Future work should examine ARM servers.',
            }),
            new Map()
        );

        expect(report.limitations.map((claim) => claim.index)).toEqual([0, 2]);
    });

    it('should union contradictions over every paper pair', () => {
        const report = synthesizeGaps(
            claimSets({
                A: 'Latency decreased by 40% with caching.',
                B: 'Latency increased by 10% with caching.',
                C: 'Caching decreased latency by 25%.',
            }),
            new Map()
        );

        expect(report.contradictions.map((pair) => [pair.first.paperId, pair.second.paperId])).toEqual([
            ['A', 'B'],
            ['B', 'C'],
        ]);
    });

    describe('emerging topics', () => {
        it('should cluster shared conclusion keywords, newest first', () => {
            const report = synthesizeGaps(claimSets(TOPIC_ABSTRACTS), TOPIC_YEARS);

            expect(report.emergingTopics.map((topic) => topic.keywords)).toEqual([
                ['federated', 'learning'],
                ['edge'],
                ['caching'],
            ]);
            expect(report.emergingTopics.map((topic) => topic.meanYear)).toEqual([2023.5, 2021, 2020]);
            expect(report.emergingTopics[1]?.paperIds).toEqual(['P1', 'P2', 'P3']);
        });

        it('should order topics with unknown years last, then by paper count', () => {
            const report = synthesizeGaps(claimSets(TOPIC_ABSTRACTS), new Map());

            expect(report.emergingTopics.map((topic) => topic.keywords)).toEqual([
                ['edge'],
                ['caching'],
                ['federated', 'learning'],
            ]);
            expect(report.emergingTopics.every((topic) => topic.meanYear === null)).toBe(true);
        });

        it('should honour the paper minimum and the topic cap', () => {
            const strict = synthesizeGaps(claimSets(TOPIC_ABSTRACTS), TOPIC_YEARS, { minTopicPapers: 3 });
            expect(strict.emergingTopics.map((topic) => topic.keywords)).toEqual([['edge']]);

            const capped = synthesizeGaps(claimSets(TOPIC_ABSTRACTS), TOPIC_YEARS, { maxEmergingTopics: 1 });
            expect(capped.emergingTopics.map((topic) => topic.keywords)).toEqual([['federated', 'learning']]);
        });
    });
});
