/**
 * Paper — one work resolved from the paper index.
 * Normalized from the OpenAlex work shape into this common form and held only
 * for the duration of a single request.
 */
export interface Paper {
    /** Short OpenAlex work ID (e.g. "W2741809807") */
    id: string;

    /** Paper title */
    title: string;

    /** Full abstract text (null when the index has none) */
    abstract: string | null;

    /** Publication year */
    year: number | null;

    /** Short IDs of the works this paper references, in index order */
    referencedWorkIds: string[];

    /** Author display names in authorship order */
    authors: string[];

    /** Citation count reported by the index */
    citedByCount: number;

    /** Digital Object Identifier (without https://doi.org/ prefix) */
    doi: string | null;

    /** DOI URL, or landing page when no DOI is known */
    url: string | null;
}
