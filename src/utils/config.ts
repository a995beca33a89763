import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type AnalysisConfig,
    type HttpConfig,
    type LogLevel,
    type OpenAlexConfig,
    type ResearchConfig,
} from '../types/index.js';
import { getLogger, isLogLevel } from './logger.js';

/**
 * Partial configuration layer. Keys that are absent leave the lower layer in place.
 */
export interface ConfigOverrides {
    openalex?: Partial<OpenAlexConfig>;
    http?: Partial<HttpConfig>;
    analysis?: Partial<AnalysisConfig>;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

const positiveInt = z.number().int().positive();

/**
 * Shape of research-mcp.config.json.
 */
const fileConfigSchema = z.object({
    openalex: z
        .object({
            email: z.string().email(),
            apiKey: z.string().min(1),
        })
        .partial()
        .optional(),
    http: z
        .object({
            timeoutMs: positiveInt,
            maxRetries: z.number().int().min(0),
            initialBackoffMs: z.number().min(0),
            maxBackoffMs: z.number().min(0),
            maxConcurrentRequests: positiveInt,
        })
        .partial()
        .optional(),
    analysis: z
        .object({
            overlapThreshold: z.number().min(0).max(1),
            extraStopwords: z.array(z.string()),
            limitationCues: z.array(z.string().min(1)),
            minTopicPapers: positiveInt,
            maxEmergingTopics: positiveInt,
        })
        .partial()
        .optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
    jsonLogs: z.boolean().optional(),
});

/**
 * Load configuration from research-mcp.config.json using cosmiconfig.
 * Returns null when no valid config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('research-mcp', {
        searchPlaces: ['research-mcp.config.json', '.research-mcprc', '.research-mcprc.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = fileConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const openalex: Partial<OpenAlexConfig> = {};

    const email = env['OPENALEX_EMAIL'];
    if (email) openalex.email = email;

    const apiKey = env['OPENALEX_API_KEY'];
    if (apiKey) openalex.apiKey = apiKey;

    if (Object.keys(openalex).length > 0) overrides.openalex = openalex;

    const level = env['RESEARCH_MCP_LOG_LEVEL'];
    if (isLogLevel(level)) overrides.logLevel = level;

    return overrides;
}

/**
 * Merge configuration layers onto the defaults.
 * Precedence follows argument order: later layers win.
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null>): ResearchConfig {
    let merged: ResearchConfig = {
        ...DEFAULT_CONFIG,
        openalex: { ...DEFAULT_CONFIG.openalex },
        http: { ...DEFAULT_CONFIG.http },
        analysis: { ...DEFAULT_CONFIG.analysis },
    };

    for (const layer of layers) {
        if (!layer) continue;
        merged = {
            ...merged,
            ...(layer.logLevel !== undefined ? { logLevel: layer.logLevel } : {}),
            ...(layer.jsonLogs !== undefined ? { jsonLogs: layer.jsonLogs } : {}),
            // Deep merge nested objects
            openalex: { ...merged.openalex, ...layer.openalex },
            http: { ...merged.http, ...layer.http },
            analysis: { ...merged.analysis, ...layer.analysis },
        };
    }

    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides = {},
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ResearchConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return mergeConfig(fileConfig, envConfig, cliFlags);
}
