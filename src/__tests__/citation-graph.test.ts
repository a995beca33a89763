import { describe, it, expect } from 'vitest';
import { CitationGraphBuilder, parseDirection } from '../graph/citation-graph.js';
import { InvalidInputError, PaperNotFoundError } from '../utils/errors.js';
import { FakeIndexClient, makePaper } from './helpers/fake-index.js';

function buildIndex(): FakeIndexClient {
    const index = new FakeIndexClient([
        makePaper('R', { title: 'Root', referencedWorkIds: ['A', 'B'] }),
        makePaper('A', { title: 'Alpha', year: 2015 }),
        makePaper('B', { title: 'Beta', year: 2016 }),
        makePaper('C', { title: 'Gamma', year: 2022 }),
    ]);
    index.citedBy.set('R', ['B', 'C']);
    return index;
}

describe('Citation Graph Builder', () => {
    describe('parseDirection', () => {
        it('should expand both into references and cited_by', () => {
            expect(parseDirection('both')).toEqual(['references', 'cited_by']);
            expect(parseDirection('cited_by')).toEqual(['cited_by']);
        });

        it('should reject unknown directions', () => {
            expect(() => parseDirection('sideways')).toThrow(InvalidInputError);
        });
    });

    it('should deduplicate papers reached in both directions', async () => {
        const graph = await new CitationGraphBuilder(buildIndex()).build('R', 'both', 10);

        expect(graph.rootId).toBe('R');
        expect(graph.nodes.map((node) => node.id)).toEqual(['R', 'A', 'B', 'C']);
        expect(graph.edges).toEqual([
            { from: 'R', to: 'A', direction: 'references' },
            { from: 'R', to: 'B', direction: 'references' },
            { from: 'B', to: 'R', direction: 'cited_by' },
            { from: 'C', to: 'R', direction: 'cited_by' },
        ]);
        expect(graph.omitted).toEqual([]);
    });

    it('should carry title and year on nodes', async () => {
        const graph = await new CitationGraphBuilder(buildIndex()).build('R', 'references', 1);

        expect(graph.nodes).toEqual([
            { id: 'R', title: 'Root', year: 2020 },
            { id: 'A', title: 'Alpha', year: 2015 },
        ]);
        expect(graph.edges).toHaveLength(1);
    });

    it('should only query the requested direction', async () => {
        const index = buildIndex();
        await new CitationGraphBuilder(index).build('R', 'references', 10);
        expect(index.calls.some((call) => call.startsWith('citations:'))).toBe(false);

        const citing = buildIndex();
        await new CitationGraphBuilder(citing).build('R', 'cited_by', 10);
        expect(citing.calls).toContain('citations:cited_by:R');
    });

    it('should omit neighbors that fail to resolve', async () => {
        const index = buildIndex();
        index.failing.add('A');

        const graph = await new CitationGraphBuilder(index).build('R', 'references', 10);

        expect(graph.nodes.map((node) => node.id)).toEqual(['R', 'B']);
        expect(graph.omitted).toEqual(['A']);
    });

    it('should leave cited_by empty when the reverse lookup fails', async () => {
        const index = buildIndex();
        index.reverseLookupFails = true;

        const graph = await new CitationGraphBuilder(index).build('R', 'both', 10);

        expect(graph.edges.every((edge) => edge.direction === 'references')).toBe(true);
        expect(graph.nodes.map((node) => node.id)).toEqual(['R', 'A', 'B']);
    });

    it('should drop self-citations', async () => {
        const index = new FakeIndexClient([
            makePaper('R', { referencedWorkIds: ['R', 'A', 'A'] }),
            makePaper('A'),
        ]);

        const graph = await new CitationGraphBuilder(index).build('R', 'references', 10);

        expect(graph.edges).toEqual([{ from: 'R', to: 'A', direction: 'references' }]);
    });

    it('should validate input before any lookup', async () => {
        const index = buildIndex();
        const builder = new CitationGraphBuilder(index);

        await expect(builder.build('R', 'sideways', 10)).rejects.toThrow(InvalidInputError);
        await expect(builder.build('R', 'both', 0)).rejects.toThrow(InvalidInputError);
        expect(index.calls).toEqual([]);
    });

    it('should fail when the root paper does not exist', async () => {
        await expect(new CitationGraphBuilder(buildIndex()).build('W404', 'both', 5)).rejects.toBeInstanceOf(
            PaperNotFoundError
        );
    });
});
