import type {
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    LlmProviderName,
    LlmProviderOptions,
} from '../types/index.js';
import { HttpError, getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { ChatCompletionSchema } from './schema.js';

/**
 * Chat-completions adapter for OpenAI and any OpenAI-compatible endpoint (Ollama's `/v1`).
 */
export class OpenAiCompatibleProvider implements LlmProvider {
    private readonly baseUrl: string;

    constructor(
        readonly name: LlmProviderName,
        private readonly options: LlmProviderOptions,
        private readonly http: HttpClient = getHttpClient()
    ) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.options.model;

        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) messages.push({ role: 'system', content: params.systemPrompt });
        messages.push({ role: 'user', content: prompt });

        const body: Record<string, unknown> = {
            model,
            messages,
            temperature: params.temperature ?? 0.3,
        };
        if (params.maxTokens !== undefined) body['max_tokens'] = params.maxTokens;
        if (params.jsonMode) body['response_format'] = { type: 'json_object' };

        const headers: Record<string, string> = {};
        if (this.options.apiKey) headers['Authorization'] = `Bearer ${this.options.apiKey}`;

        const response = await this.http.post(`${this.baseUrl}/chat/completions`, body, {
            headers,
            source: this.name,
            timeout: this.options.timeoutMs,
            signal: params.signal,
        });

        const parsed = ChatCompletionSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new HttpError('Malformed chat completion response', response.status, false, response.data);
        }

        const completion = parsed.data;
        const text = completion.choices[0]?.message.content ?? '';
        const usage = {
            promptTokens: completion.usage?.prompt_tokens ?? 0,
            completionTokens: completion.usage?.completion_tokens ?? 0,
            totalTokens: completion.usage?.total_tokens ?? 0,
        };

        getLogger().debug({ provider: this.name, model, ...usage }, 'LLM completion received');

        return {
            text,
            usage,
            model: completion.model ?? model,
            provider: this.name,
        };
    }
}
