/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Outbound HTTP behaviour shared by every index request.
 */
export interface HttpConfig {
    /** Per-attempt timeout */
    timeoutMs: number;
    /** Retries after the first attempt for 429/5xx, timeouts and socket errors */
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    /** Upper bound on simultaneous in-flight requests */
    maxConcurrentRequests: number;
}

/**
 * Tuning parameters of the claim analysis heuristics.
 */
export interface AnalysisConfig {
    /** Two claims share a topic when their overlap score exceeds this value */
    overlapThreshold: number;
    /** Words ignored by topic overlap on top of the built-in stopword list */
    extraStopwords: string[];
    /** Phrases that mark a methodology/conclusion sentence as a limitation */
    limitationCues: string[];
    /** Distinct papers a keyword cluster needs to count as an emerging topic */
    minTopicPapers: number;
    maxEmergingTopics: number;
}

/**
 * OpenAlex access settings.
 */
export interface OpenAlexConfig {
    /** Contact email for the polite pool */
    email?: string;
    apiKey?: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ResearchConfig {
    openalex: OpenAlexConfig;
    http: HttpConfig;
    analysis: AnalysisConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

export const DEFAULT_LIMITATION_CUES: readonly string[] = [
    'limited to',
    'does not address',
    'do not address',
    'future work',
    'small sample',
    'limitation',
    'further research',
    'not generalize',
];

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ResearchConfig = {
    openalex: {},
    http: {
        timeoutMs: 30000,
        maxRetries: 3,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
        maxConcurrentRequests: 4,
    },
    analysis: {
        overlapThreshold: 0.3,
        extraStopwords: [],
        limitationCues: [...DEFAULT_LIMITATION_CUES],
        minTopicPapers: 2,
        maxEmergingTopics: 10,
    },
    logLevel: 'info',
    jsonLogs: false,
};
