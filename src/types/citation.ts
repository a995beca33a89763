/**
 * Direction of a citation lookup.
 * `references` follows the paper's bibliography (backward),
 * `cited_by` follows works that cite it (forward).
 */
export type CitationDirection = 'references' | 'cited_by';

/** Direction accepted by the graph builder; `both` runs each lookup once. */
export type CitationQueryDirection = CitationDirection | 'both';

export const CITATION_QUERY_DIRECTIONS: readonly CitationQueryDirection[] = ['cited_by', 'references', 'both'];

export interface CitationNode {
    id: string;
    title: string;
    year: number | null;
}

/**
 * Citation relationship. `from` is always the citing work, so a `references`
 * edge starts at the root and a `cited_by` edge ends at it.
 */
export interface CitationEdge {
    from: string;
    to: string;
    direction: CitationDirection;
}

export interface CitationGraph {
    rootId: string;
    nodes: CitationNode[];
    edges: CitationEdge[];
    /** Neighbor IDs whose fetch failed and were left out */
    omitted: string[];
}
