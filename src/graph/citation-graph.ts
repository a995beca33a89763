import type {
    CitationDirection,
    CitationEdge,
    CitationGraph,
    CitationNode,
    CitationQueryDirection,
    IndexRequestOptions,
    Paper,
    PaperIndexClient,
} from '../types/index.js';
import { CITATION_QUERY_DIRECTIONS } from '../types/index.js';
import { InvalidInputError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

function isQueryDirection(value: string): value is CitationQueryDirection {
    return CITATION_QUERY_DIRECTIONS.some((direction) => direction === value);
}

/**
 * Validate a direction string and expand `both` into its two lookups.
 * @throws InvalidInputError for anything other than cited_by, references or both
 */
export function parseDirection(value: string): CitationDirection[] {
    if (!isQueryDirection(value)) {
        throw new InvalidInputError(
            `Invalid citation direction "${value}"; expected one of ${CITATION_QUERY_DIRECTIONS.join(', ')}`
        );
    }
    return value === 'both' ? ['references', 'cited_by'] : [value];
}

/**
 * Node arena plus ID → position index, so a paper reached twice is stored once.
 */
class GraphAccumulator {
    readonly nodes: CitationNode[] = [];
    readonly edges: CitationEdge[] = [];
    private readonly nodeIndex = new Map<string, number>();
    private readonly edgeKeys = new Set<string>();

    addNode(paper: Paper): void {
        if (this.nodeIndex.has(paper.id)) return;
        this.nodeIndex.set(paper.id, this.nodes.length);
        this.nodes.push({ id: paper.id, title: paper.title, year: paper.year });
    }

    addEdge(edge: CitationEdge): void {
        const key = `${edge.from}->${edge.to}:${edge.direction}`;
        if (this.edgeKeys.has(key)) return;
        this.edgeKeys.add(key);
        this.edges.push(edge);
    }
}

/**
 * Resolves a paper's forward/backward citation neighborhood into a
 * deduplicated node/edge set.
 *
 * Neighbor fetches that fail are left out and reported in `omitted`; only the
 * root lookup is fatal.
 */
export class CitationGraphBuilder {
    constructor(private readonly index: PaperIndexClient) {}

    /**
     * @throws InvalidInputError for a bad direction or limit (before any request)
     * @throws PaperNotFoundError when the root does not resolve
     */
    async build(
        paperId: string,
        direction: string,
        maxResultsPerDirection: number,
        options: IndexRequestOptions = {}
    ): Promise<CitationGraph> {
        const directions = parseDirection(direction);
        if (!Number.isInteger(maxResultsPerDirection) || maxResultsPerDirection < 1) {
            throw new InvalidInputError(`maxResultsPerDirection must be a positive integer, got ${maxResultsPerDirection}`);
        }

        const root = await this.index.getById(paperId, options);
        const graph = new GraphAccumulator();
        graph.addNode(root);

        const lookups = await Promise.all(
            directions.map((dir) => this.resolveDirection(root, dir, maxResultsPerDirection, options))
        );
        options.signal?.throwIfAborted();

        const omitted: string[] = [];
        for (const { direction: dir, neighbors, failed } of lookups) {
            for (const neighbor of neighbors) {
                graph.addNode(neighbor);
                graph.addEdge(
                    dir === 'references'
                        ? { from: root.id, to: neighbor.id, direction: dir }
                        : { from: neighbor.id, to: root.id, direction: dir }
                );
            }
            for (const id of failed) {
                if (!omitted.includes(id)) omitted.push(id);
            }
        }

        getLogger().debug(
            { rootId: root.id, directions, nodes: graph.nodes.length, edges: graph.edges.length, omitted: omitted.length },
            'Citation graph built'
        );

        return { rootId: root.id, nodes: graph.nodes, edges: graph.edges, omitted };
    }

    private async resolveDirection(
        root: Paper,
        direction: CitationDirection,
        limit: number,
        options: IndexRequestOptions
    ): Promise<{ direction: CitationDirection; neighbors: Paper[]; failed: string[] }> {
        const ids = await this.neighborIds(root, direction, limit, options);
        const unique = [...new Set(ids)].filter((id) => id !== root.id);

        const settled = await Promise.allSettled(unique.map((id) => this.index.getById(id, options)));

        const neighbors: Paper[] = [];
        const failed: string[] = [];
        settled.forEach((result, i) => {
            const id = unique[i] ?? '';
            if (result.status === 'fulfilled') {
                neighbors.push(result.value);
            } else {
                failed.push(id);
                getLogger().warn({ paperId: id, direction, error: describeError(result.reason) }, 'Dropping citation neighbor');
            }
        });

        return { direction, neighbors, failed };
    }

    /**
     * References come from the root's stored list; citing works need a reverse lookup,
     * whose failure leaves the direction empty.
     */
    private async neighborIds(
        root: Paper,
        direction: CitationDirection,
        limit: number,
        options: IndexRequestOptions
    ): Promise<string[]> {
        if (direction === 'references') {
            return root.referencedWorkIds.slice(0, limit);
        }

        try {
            return (await this.index.getCitations(root.id, 'cited_by', limit, options)).slice(0, limit);
        } catch (error) {
            options.signal?.throwIfAborted();
            getLogger().warn({ paperId: root.id, error: describeError(error) }, 'Reverse citation lookup failed');
            return [];
        }
    }
}
