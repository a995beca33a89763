/**
 * Machine-readable error codes surfaced to callers.
 */
export type ResearchErrorCode = 'PAPER_NOT_FOUND' | 'INVALID_INPUT' | 'UPSTREAM_UNAVAILABLE';

/**
 * Base class for every error the analysis pipeline reports to its caller.
 */
export class ResearchError extends Error {
    constructor(
        message: string,
        public readonly code: ResearchErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ResearchError';
    }
}

/**
 * The paper ID does not resolve at the index.
 */
export class PaperNotFoundError extends ResearchError {
    constructor(public readonly paperId: string, options?: { cause?: unknown }) {
        super(`Paper not found: ${paperId}`, 'PAPER_NOT_FOUND', options);
        this.name = 'PaperNotFoundError';
    }
}

/**
 * Out-of-range paper counts, malformed direction values, empty queries.
 * Always raised before any network call is made.
 */
export class InvalidInputError extends ResearchError {
    constructor(message: string) {
        super(message, 'INVALID_INPUT');
        this.name = 'InvalidInputError';
    }
}

/**
 * Retry budget exhausted on a fetch that cannot be treated as a partial result.
 */
export class UpstreamUnavailableError extends ResearchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'UPSTREAM_UNAVAILABLE', options);
        this.name = 'UpstreamUnavailableError';
    }
}

/**
 * Short description of any thrown value for logs and tool output.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
