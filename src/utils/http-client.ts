import { setTimeout as delay } from 'node:timers/promises';
import pLimit, { type LimitFunction } from 'p-limit';
import { DEFAULT_CONFIG, type HttpConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    /**
     * Take a token, returning how long the caller must wait before using it.
     */
    reserve(): number {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return 0;
        }

        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        return waitMs;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    openalex: { tokensPerSecond: 10, maxBurst: 10 },  // 10/s with polite pool
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    timeout?: number;
    source?: string;  // For per-source rate limiting
    signal?: AbortSignal;  // Caller cancellation, stops retries too
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    /** Parsed JSON for JSON responses, text otherwise; callers validate the shape */
    data: unknown;
    ok: boolean;
}

/**
 * Outcome of one network attempt, before status handling.
 */
interface AttemptResult extends HttpResponse {
    statusText: string;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export type HttpClientOptions = Partial<HttpConfig> & { version?: string; email?: string };

/**
 * Centralized HTTP client with per-source rate limiting, a cap on in-flight
 * requests and retry logic.
 *
 * Only the network attempt itself holds a concurrency slot; backoff sleeps do not.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly limit: LimitFunction;
    private readonly settings: HttpConfig;
    private readonly userAgent: string;

    constructor(options: HttpClientOptions = {}) {
        const { version = '1.0.0', email, ...http } = options;
        this.settings = { ...DEFAULT_CONFIG.http, ...http };
        this.limit = pLimit(this.settings.maxConcurrentRequests);
        this.userAgent = email
            ? `research-mcp/${version} (mailto:${email})`
            : `research-mcp/${version}`;
    }

    /**
     * GET a URL with rate limiting and retry.
     * Aborting `signal` cancels the in-flight attempt and any backoff or rate-limit wait.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { timeout = this.settings.timeoutMs, source = 'default', signal } = options;

        const headers: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
        };

        const { maxRetries, initialBackoffMs, maxBackoffMs } = this.settings;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            if (signal?.aborted) {
                throw abortedError(url);
            }

            // Acquire rate limit token
            await this.pause(this.getBucket(source).reserve(), url, signal);

            let response: AttemptResult;
            try {
                response = await this.limit(() => this.fetchOnce(url, headers, timeout, signal));
            } catch (error) {
                if (signal?.aborted) {
                    throw abortedError(url);
                }

                const timedOut = error instanceof Error && error.name === 'AbortError';
                const errorCode = networkErrorCode(error);
                const retryable = timedOut || (errorCode !== undefined && RETRYABLE_ERROR_CODES.has(errorCode));

                if (retryable && attempt < maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoffMs, maxBackoffMs);
                    getLogger().warn(
                        { errorCode: timedOut ? 'TIMEOUT' : errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        `Retryable network error, backing off`
                    );
                    await this.pause(backoff, url, signal);
                    continue;
                }

                if (timedOut) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            }

            if (response.ok) {
                return { status: response.status, headers: response.headers, data: response.data, ok: true };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);

            if (retryable && attempt < maxRetries) {
                const retryAfter = this.parseRetryAfter(response.headers['retry-after'] ?? null);
                const backoff = retryAfter !== null
                    ? Math.min(maxBackoffMs, retryAfter)
                    : this.calculateBackoff(attempt, initialBackoffMs, maxBackoffMs);

                getLogger().warn(
                    { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                    `Retryable HTTP error, backing off`
                );
                await this.pause(backoff, url, signal);
                continue;
            }

            throw new HttpError(
                `HTTP ${response.status}: ${response.statusText}`,
                response.status,
                retryable,
                response.data
            );
        }

        // Should never reach here, but TypeScript needs it
        throw new HttpError(`Max retries exceeded for ${url}`, 0, true);
    }

    /**
     * One network attempt. Parses the body and flattens headers; status handling is left to the caller.
     */
    private async fetchOnce(
        url: string,
        headers: Record<string, string>,
        timeout: number,
        signal: AbortSignal | undefined
    ): Promise<AttemptResult> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const response = await fetch(url, { method: 'GET', headers, signal: controller.signal });

            // Parse response
            const contentType = response.headers.get('content-type') ?? '';
            const data: unknown = contentType.includes('application/json')
                ? await response.json()
                : await response.text();

            // Build headers map
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            return {
                ok: response.ok,
                status: response.status,
                statusText: response.statusText,
                headers: responseHeaders,
                data,
            };
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Wait out a backoff or rate-limit delay; a caller abort ends the wait early.
     */
    private async pause(ms: number, url: string, signal: AbortSignal | undefined): Promise<void> {
        if (ms <= 0) return;
        try {
            await delay(ms, undefined, { signal });
        } catch (error) {
            if (signal?.aborted) throw abortedError(url);
            throw error;
        }
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? RATE_LIMITS['default'] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Socket-level error code, either on the error itself or on undici's `cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    if ('cause' in error) return networkErrorCode(error.cause);
    return undefined;
}

function abortedError(url: string): HttpError {
    return new HttpError(`Request aborted: ${url}`, 0, false);
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
