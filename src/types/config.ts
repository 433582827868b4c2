/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * LLM provider used by the narrative enrichment pass.
 */
export type LlmProviderName = 'openai' | 'ollama';

/**
 * Narrative enrichment configuration.
 */
export interface EnrichmentConfig {
    enabled: boolean;
    provider: LlmProviderName;
    model: string;
    /** OpenAI-compatible API root; defaults per provider when unset */
    baseUrl?: string;
    /** Environment variable holding the API key */
    apiKeyEnv: string;
    /** Hard limit on the enrichment call */
    timeoutMs: number;
    /** Maximum number of profiles sent in one request */
    maxRoles: number;
}

/**
 * Pipeline-level limits.
 */
export interface PipelineConfig {
    /** Whole-run timeout; 0 disables it */
    timeoutMs: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ScenarioSynthConfig {
    // Storage
    db: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    pipeline: PipelineConfig;

    enrichment: EnrichmentConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ScenarioSynthConfig = {
    db: './scenario-synth.db',
    logLevel: 'info',
    jsonLogs: false,
    pipeline: {
        timeoutMs: 120000,
    },
    enrichment: {
        enabled: false,
        provider: 'openai',
        model: 'gpt-4.1-mini',
        apiKeyEnv: 'OPENAI_API_KEY',
        timeoutMs: 30000,
        maxRoles: 15,
    },
};

/** Default API roots per provider */
export const DEFAULT_BASE_URLS: Readonly<Record<LlmProviderName, string>> = {
    openai: 'https://api.openai.com/v1',
    ollama: 'http://localhost:11434/v1',
};
