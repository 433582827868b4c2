import { DEFAULT_BASE_URLS, type EnrichmentConfig, type NarrativeEnricher } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { LlmNarrativeEnricher } from './llm-enricher.js';
import { NoopNarrativeEnricher } from './noop-enricher.js';
import { OpenAiCompatibleProvider } from './openai-provider.js';

/**
 * Build the enricher the configuration asks for. Falls back to the no-op
 * enricher when enrichment is off or a cloud provider has no API key.
 */
export function createNarrativeEnricher(config: EnrichmentConfig): NarrativeEnricher {
    if (!config.enabled) return new NoopNarrativeEnricher();

    const apiKey = getApiKey(config.apiKeyEnv);
    if (config.provider === 'openai' && !apiKey) {
        getLogger().warn({ env: config.apiKeyEnv }, 'Enrichment enabled but no API key set, skipping enrichment');
        return new NoopNarrativeEnricher();
    }

    const provider = new OpenAiCompatibleProvider(config.provider, {
        apiKey,
        baseUrl: config.baseUrl ?? DEFAULT_BASE_URLS[config.provider],
        model: config.model,
        timeoutMs: config.timeoutMs,
    });

    return new LlmNarrativeEnricher(provider, { maxRoles: config.maxRoles, model: config.model });
}
