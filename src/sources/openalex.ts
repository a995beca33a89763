import { z } from 'zod';
import type {
    CitationDirection,
    IndexRequestOptions,
    OpenAlexConfig,
    Paper,
    PaperIndexClient,
} from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { PaperNotFoundError, UpstreamUnavailableError, describeError } from '../utils/errors.js';
import { invertedIndexToText, normalizeWorkId, stripDoiPrefix } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';

/** OpenAlex caps per_page at 200 */
const MAX_PER_PAGE = 200;

/**
 * OpenAlex API response shapes (subset of relevant fields). Unknown keys are dropped.
 */
const workSchema = z.object({
    id: z.string(),
    doi: z.string().nullish(),
    title: z.string().nullish(),
    display_name: z.string().nullish(),
    publication_year: z.number().int().nullish(),
    abstract_inverted_index: z.record(z.array(z.number())).nullish(),
    primary_location: z
        .object({
            landing_page_url: z.string().nullish(),
        })
        .nullish(),
    cited_by_count: z.number().nullish(),
    authorships: z
        .array(
            z.object({
                author: z.object({ display_name: z.string().nullish() }).nullish(),
            })
        )
        .nullish(),
    referenced_works: z.array(z.string()).nullish(),
});

const listResponseSchema = z.object({
    results: z.array(workSchema),
});

type OpenAlexWork = z.infer<typeof workSchema>;
type OpenAlexListResponse = z.infer<typeof listResponseSchema>;

/**
 * Validate a response body; a body of the wrong shape counts as an upstream failure.
 */
function parseResponse<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new UpstreamUnavailableError(`OpenAlex returned an unexpected response for ${what}`, {
            cause: parsed.error,
        });
    }
    return parsed.data;
}

export interface OpenAlexClientOptions extends OpenAlexConfig {
    httpClient?: HttpClient;
    baseUrl?: string;
}

/**
 * OpenAlex implementation of the paper index.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexClient implements PaperIndexClient {
    readonly name = 'OpenAlex';
    private readonly httpClient: HttpClient;
    private readonly baseUrl: string;
    private readonly apiKey?: string;
    private readonly email?: string;

    constructor(options: OpenAlexClientOptions = {}) {
        this.httpClient = options.httpClient ?? getHttpClient();
        this.baseUrl = options.baseUrl ?? OPENALEX_BASE;
        this.apiKey = options.apiKey;
        this.email = options.email;
    }

    normalizeId(paperId: string): string {
        return normalizeWorkId(paperId);
    }

    async search(query: string, maxResults: number, yearFrom?: number, options: IndexRequestOptions = {}): Promise<Paper[]> {
        const params = new URLSearchParams({
            search: query,
            per_page: String(Math.min(maxResults, MAX_PER_PAGE)),
            sort: 'cited_by_count:desc',
        });

        if (yearFrom !== undefined) {
            params.set('filter', `publication_year:>${yearFrom - 1}`);
        }

        const data = await this.list(params, options);
        return data.results.slice(0, maxResults).map((work) => this.normalizeWork(work));
    }

    async getById(paperId: string, options: IndexRequestOptions = {}): Promise<Paper> {
        return this.normalizeWork(await this.fetchWork(paperId, options));
    }

    async getCitations(
        paperId: string,
        direction: CitationDirection,
        maxResults: number,
        options: IndexRequestOptions = {}
    ): Promise<string[]> {
        if (direction === 'references') {
            const work = await this.fetchWork(paperId, options);
            return (work.referenced_works ?? []).slice(0, maxResults).map(normalizeWorkId);
        }

        const params = new URLSearchParams({
            filter: `cites:${normalizeWorkId(paperId)}`,
            per_page: String(Math.min(maxResults, MAX_PER_PAGE)),
            sort: 'cited_by_count:desc',
            select: 'id',
        });

        const data = await this.list(params, options);
        return data.results.slice(0, maxResults).map((work) => normalizeWorkId(work.id));
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchWork(paperId: string, options: IndexRequestOptions): Promise<OpenAlexWork> {
        const workId = normalizeWorkId(paperId);
        if (!workId) {
            throw new PaperNotFoundError(paperId);
        }

        const params = new URLSearchParams();
        this.addAuthParams(params);

        const query = params.toString();
        const url = `${this.baseUrl}/works/${encodeURIComponent(workId)}${query ? `?${query}` : ''}`;
        getLogger().debug({ url }, 'OpenAlex fetch work');

        let data: unknown;
        try {
            data = (await this.httpClient.get(url, { source: 'openalex', signal: options.signal })).data;
        } catch (error) {
            if (error instanceof HttpError && (error.status === 404 || error.status === 400)) {
                throw new PaperNotFoundError(workId, { cause: error });
            }
            throw new UpstreamUnavailableError(`OpenAlex lookup of ${workId} failed: ${describeError(error)}`, { cause: error });
        }

        return parseResponse(workSchema, data, `work ${workId}`);
    }

    private async list(params: URLSearchParams, options: IndexRequestOptions): Promise<OpenAlexListResponse> {
        this.addAuthParams(params);

        const url = `${this.baseUrl}/works?${params.toString()}`;
        getLogger().debug({ url }, 'OpenAlex list works');

        let data: unknown;
        try {
            data = (await this.httpClient.get(url, { source: 'openalex', signal: options.signal })).data;
        } catch (error) {
            throw new UpstreamUnavailableError(`OpenAlex query failed: ${describeError(error)}`, { cause: error });
        }

        return parseResponse(listResponseSchema, data, 'works query');
    }

    private normalizeWork(work: OpenAlexWork): Paper {
        const doi = stripDoiPrefix(work.doi);

        const authors = (work.authorships ?? [])
            .map((authorship) => authorship.author?.display_name)
            .filter((name): name is string => !!name);

        return {
            id: normalizeWorkId(work.id),
            title: work.display_name ?? work.title ?? 'Untitled',
            abstract: invertedIndexToText(work.abstract_inverted_index),
            year: work.publication_year ?? null,
            referencedWorkIds: (work.referenced_works ?? []).map(normalizeWorkId),
            authors,
            citedByCount: work.cited_by_count ?? 0,
            doi,
            url: doi ? `https://doi.org/${doi}` : work.primary_location?.landing_page_url ?? work.id,
        };
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}
