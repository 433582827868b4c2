import type { LlmProviderName } from './config.js';

/**
 * Interface for LLM provider adapters used by the narrative enrichment pass.
 */
export interface LlmProvider {
    readonly name: LlmProviderName;

    /**
     * Send a completion request.
     * Rejects with an `HttpError` on transport failures, including aborts.
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    maxTokens?: number;
    /** Ask the endpoint for a JSON object response */
    jsonMode?: boolean;
    systemPrompt?: string;
    /** Cancels the request when aborted */
    signal?: AbortSignal;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model that answered */
    model: string;
    provider: LlmProviderName;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (cloud providers) */
    apiKey?: string;
    /** OpenAI-compatible API root */
    baseUrl: string;
    /** Default model */
    model: string;
    /** Per-request timeout */
    timeoutMs?: number;
}
