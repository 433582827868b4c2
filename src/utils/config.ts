import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ScenarioSynthConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Shape of scenariosynth.config.json; every key optional.
 */
const ConfigFileSchema = z.object({
    db: z.string().min(1).optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
    jsonLogs: z.boolean().optional(),
    pipeline: z.object({
        timeoutMs: z.number().int().min(0).optional(),
    }).optional(),
    enrichment: z.object({
        enabled: z.boolean().optional(),
        provider: z.enum(['openai', 'ollama']).optional(),
        model: z.string().min(1).optional(),
        baseUrl: z.string().url().optional(),
        apiKeyEnv: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
        maxRoles: z.number().int().positive().optional(),
    }).optional(),
});

/**
 * Partial config as accepted from a file or CLI flags (nested sections may be partial too).
 */
export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

/**
 * Load configuration from scenariosynth.config.json using cosmiconfig.
 * Returns null when no config file is found; defaults apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('scenariosynth', {
        searchPlaces: ['scenariosynth.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
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
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const db = process.env['SCENARIO_SYNTH_DB'];
    if (db) env.db = db;

    // API keys are read where needed (never stored in config); only note availability
    if (process.env[DEFAULT_CONFIG.enrichment.apiKeyEnv]) {
        getLogger().debug({ env: DEFAULT_CONFIG.enrichment.apiKeyEnv }, 'LLM API key detected in environment');
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    searchFrom?: string
): Promise<ScenarioSynthConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig ?? {}, envConfig, cliFlags);
}

/**
 * Layer overrides onto the defaults, later sources winning; nested sections are merged key by key.
 */
export function mergeConfig(...layers: ConfigOverrides[]): ScenarioSynthConfig {
    let merged: ScenarioSynthConfig = DEFAULT_CONFIG;
    for (const layer of layers) {
        merged = {
            db: layer.db ?? merged.db,
            logLevel: layer.logLevel ?? merged.logLevel,
            jsonLogs: layer.jsonLogs ?? merged.jsonLogs,
            pipeline: {
                timeoutMs: layer.pipeline?.timeoutMs ?? merged.pipeline.timeoutMs,
            },
            enrichment: {
                enabled: layer.enrichment?.enabled ?? merged.enrichment.enabled,
                provider: layer.enrichment?.provider ?? merged.enrichment.provider,
                model: layer.enrichment?.model ?? merged.enrichment.model,
                baseUrl: layer.enrichment?.baseUrl ?? merged.enrichment.baseUrl,
                apiKeyEnv: layer.enrichment?.apiKeyEnv ?? merged.enrichment.apiKeyEnv,
                timeoutMs: layer.enrichment?.timeoutMs ?? merged.enrichment.timeoutMs,
                maxRoles: layer.enrichment?.maxRoles ?? merged.enrichment.maxRoles,
            },
        };
    }
    return merged;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
