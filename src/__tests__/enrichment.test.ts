import { describe, it, expect, vi, afterEach } from 'vitest';
import { LlmNarrativeEnricher, buildEnrichmentPrompt, extractJsonObject } from '../enrichment/llm-enricher.js';
import { OpenAiCompatibleProvider } from '../enrichment/openai-provider.js';
import { createNarrativeEnricher } from '../enrichment/factory.js';
import { NoopNarrativeEnricher } from '../enrichment/noop-enricher.js';
import { buildProfile } from '../participants/profile-builder.js';
import {
    DEFAULT_CONFIG,
    EntityType,
    type EnrichmentRequest,
    type LlmCompletionParams,
    type LlmCompletionResult,
    type LlmProvider,
} from '../types/index.js';
import { EnrichmentError } from '../utils/errors.js';
import { HttpClient } from '../utils/http-client.js';
import { makeEntity } from './helpers/entities.js';

class FakeProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly prompts: Array<{ prompt: string; params?: LlmCompletionParams }> = [];

    constructor(private readonly answer: string) { }

    async complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult> {
        this.prompts.push({ prompt, params });
        return {
            text: this.answer,
            usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
            model: 'test-model',
            provider: this.name,
        };
    }
}

const profiles = [
    buildProfile(makeEntity('case:1#A', EntityType.ROLE, {
        label: 'Engineer A',
        properties: { relationships: [{ type: 'serves', target: 'case:1#B' }, { type: 'knows', target: 'case:1#Outside' }] },
    })),
    buildProfile(makeEntity('case:1#B', EntityType.ROLE, { label: 'Client B' })),
];

const request: EnrichmentRequest = {
    caseId: 'case-1',
    participants: profiles,
    relationshipGraph: {},
    timeline: null,
};

describe('LlmNarrativeEnricher', () => {
    it('should map short ids in the answer back to profile ids', async () => {
        const provider = new FakeProvider('{"profiles":[{"id":"P2","characterArc":"Client B resists."}],"teachingNotes":["Discuss"]}');
        const enricher = new LlmNarrativeEnricher(provider, { maxRoles: 5 });

        const output = await enricher.enhance(request, new AbortController().signal);

        expect(enricher.name).toBe('llm:ollama');
        expect(output).toEqual({
            profiles: [{ id: 'case:1#B', characterArc: 'Client B resists.' }],
            teachingNotes: ['Discuss'],
        });
    });

    it('should request JSON output and forward the abort signal', async () => {
        const provider = new FakeProvider('{"profiles":[]}');
        const signal = new AbortController().signal;

        await new LlmNarrativeEnricher(provider, { maxRoles: 5, model: 'small-model' }).enhance(request, signal);

        expect(provider.prompts[0]?.params).toMatchObject({
            model: 'small-model',
            temperature: 0.4,
            maxTokens: 2000,
            jsonMode: true,
            signal,
        });
    });

    it('should send at most maxRoles profiles and reject ids it did not send', async () => {
        const provider = new FakeProvider('{"profiles":[{"id":"P2","background":"x"}]}');
        const enricher = new LlmNarrativeEnricher(provider, { maxRoles: 1 });

        await expect(enricher.enhance(request, new AbortController().signal)).rejects.toThrow(EnrichmentError);
        expect(provider.prompts[0]?.prompt).toContain('"id": "P1"');
        expect(provider.prompts[0]?.prompt).not.toContain('"id": "P2"');
    });

    it('should skip the call when no profiles are allowed', async () => {
        const provider = new FakeProvider('{}');
        const output = await new LlmNarrativeEnricher(provider, { maxRoles: 0 }).enhance(request, new AbortController().signal);

        expect(output).toEqual({ profiles: [], teachingNotes: [] });
        expect(provider.prompts).toHaveLength(0);
    });

    it('should reject answers that fail validation', async () => {
        const provider = new FakeProvider('{"profiles":"none"}');
        await expect(new LlmNarrativeEnricher(provider, { maxRoles: 5 }).enhance(request, new AbortController().signal))
            .rejects.toThrow('Enrichment response failed validation: 1 issue(s)');
    });
});

describe('buildEnrichmentPrompt', () => {
    it('should list profiles under short ids and keep only in-batch relations', () => {
        const prompt = buildEnrichmentPrompt('case-1', profiles, null);
        const lines = prompt.split('\n');

        expect(lines[0]).toBe('Case: case-1');
        expect(lines[1]).toBe('Timeline: not available.');
        expect(prompt).toContain('"relatedTo": [\n      "P2"\n    ]');
        expect(prompt).not.toContain('case:1#');
    });

    it('should name an unnamed case', () => {
        expect(buildEnrichmentPrompt(null, [], null).split('\n')[0]).toBe('Case: (unnamed)');
    });
});

describe('extractJsonObject', () => {
    it('should tolerate code fences and surrounding prose', () => {
        expect(extractJsonObject('Here you go:\n```json\n{"a": {"b": 1}}\n```\nDone.')).toEqual({ a: { b: 1 } });
    });

    it('should reject answers without an object', () => {
        expect(() => extractJsonObject('no json here')).toThrow('Enrichment response contains no JSON object');
    });

    it('should reject malformed JSON', () => {
        expect(() => extractJsonObject('{"a": }')).toThrow(EnrichmentError);
    });
});

describe('OpenAiCompatibleProvider', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should post a chat completion and read the first choice', async () => {
        const mockFetch = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify({
            model: 'served-model',
            choices: [{ message: { content: '{"profiles":[]}' } }],
            usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
        }), { status: 200, headers: { 'content-type': 'application/json' } }));
        vi.stubGlobal('fetch', mockFetch);

        const provider = new OpenAiCompatibleProvider(
            'openai',
            { apiKey: 'test-secret', baseUrl: 'https://llm.test/v1/', model: 'default-model' },
            new HttpClient({ maxRetries: 0 })
        );
        const result = await provider.complete('Hello', { systemPrompt: 'Be brief', jsonMode: true, maxTokens: 50 });

        expect(result).toEqual({
            text: '{"profiles":[]}',
            usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
            model: 'served-model',
            provider: 'openai',
        });

        const [url, init] = mockFetch.mock.calls[0] ?? [];
        expect(url).toBe('https://llm.test/v1/chat/completions');
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'default-model',
            messages: [
                { role: 'system', content: 'Be brief' },
                { role: 'user', content: 'Hello' },
            ],
            temperature: 0.3,
            max_tokens: 50,
            response_format: { type: 'json_object' },
        });
        expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    });

    it('should reject a malformed response', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ choices: [] }), {
            status: 200,
            headers: { 'content-type': 'application/json' },
        })));

        const provider = new OpenAiCompatibleProvider('ollama', { baseUrl: 'http://local.test/v1', model: 'm' }, new HttpClient());
        await expect(provider.complete('Hello')).rejects.toThrow('Malformed chat completion response');
    });
});

describe('createNarrativeEnricher', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('should use the no-op enricher when enrichment is disabled', () => {
        expect(createNarrativeEnricher(DEFAULT_CONFIG.enrichment)).toBeInstanceOf(NoopNarrativeEnricher);
    });

    it('should fall back to the no-op enricher when the cloud key is missing', () => {
        vi.stubEnv('SCENARIO_SYNTH_TEST_KEY', '');
        const enricher = createNarrativeEnricher({ ...DEFAULT_CONFIG.enrichment, enabled: true, apiKeyEnv: 'SCENARIO_SYNTH_TEST_KEY' });
        expect(enricher.name).toBe('noop');
    });

    it('should build an LLM enricher for a keyed or local provider', () => {
        vi.stubEnv('SCENARIO_SYNTH_TEST_KEY', 'test-secret');
        const cloud = createNarrativeEnricher({ ...DEFAULT_CONFIG.enrichment, enabled: true, apiKeyEnv: 'SCENARIO_SYNTH_TEST_KEY' });
        const local = createNarrativeEnricher({ ...DEFAULT_CONFIG.enrichment, enabled: true, provider: 'ollama', apiKeyEnv: 'SCENARIO_SYNTH_UNSET_KEY' });

        expect(cloud.name).toBe('llm:openai');
        expect(local.name).toBe('llm:ollama');
    });
});
