import type {
    EnrichmentOutput,
    EnrichmentRequest,
    LlmProvider,
    NarrativeEnricher,
    ParticipantProfile,
    ScenarioTimeline,
} from '../types/index.js';
import { EnrichmentError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { EnrichmentOutputSchema } from './schema.js';

const SYSTEM_PROMPT = `You write teaching material for professional-ethics case studies.
You are given participant profiles that were derived mechanically from case data.
Rewrite each participant's background and character arc as two to three fluent sentences.
Stay faithful to the data: do not invent facts, names or events.
Also write two to four short notes for the instructor about the ethical tensions worth discussing.
Respond with a single JSON object and nothing else.`;

export interface LlmEnricherOptions {
    /** Most profiles sent in one request; the rest stay unenriched */
    maxRoles: number;
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

/**
 * Narrative enricher backed by a chat-completions model.
 *
 * Profiles are sent under short ids (P1, P2, ...) and mapped back on return;
 * an answer naming an id that was not sent is rejected.
 */
export class LlmNarrativeEnricher implements NarrativeEnricher {
    readonly name: string;

    constructor(
        private readonly provider: LlmProvider,
        private readonly options: LlmEnricherOptions
    ) {
        this.name = `llm:${provider.name}`;
    }

    async enhance(request: EnrichmentRequest, signal: AbortSignal): Promise<EnrichmentOutput> {
        const selected = request.participants.slice(0, Math.max(0, this.options.maxRoles));
        if (selected.length === 0) return { profiles: [], teachingNotes: [] };

        const shortIds = new Map<string, string>();
        selected.forEach((profile, index) => shortIds.set(`P${index + 1}`, profile.id));

        const prompt = buildEnrichmentPrompt(request.caseId, selected, request.timeline);
        const result = await this.provider.complete(prompt, {
            model: this.options.model,
            temperature: this.options.temperature ?? 0.4,
            maxTokens: this.options.maxTokens ?? 2000,
            jsonMode: true,
            systemPrompt: SYSTEM_PROMPT,
            signal,
        });

        getLogger().debug({ enricher: this.name, tokens: result.usage.totalTokens }, 'Enrichment response received');

        const parsed = EnrichmentOutputSchema.safeParse(extractJsonObject(result.text));
        if (!parsed.success) {
            throw new EnrichmentError(`Enrichment response failed validation: ${parsed.error.issues.length} issue(s)`);
        }

        const profiles = parsed.data.profiles.map((text) => {
            const id = shortIds.get(text.id);
            if (!id) throw new EnrichmentError(`Enrichment response names unknown profile ${text.id}`);
            return { ...text, id };
        });

        return { profiles, teachingNotes: parsed.data.teachingNotes };
    }
}

/**
 * Prompt body: the selected profiles under short ids plus a one-line timeline outline.
 */
export function buildEnrichmentPrompt(
    caseId: string | null,
    profiles: readonly ParticipantProfile[],
    timeline: ScenarioTimeline | null
): string {
    const shortIdOf = new Map(profiles.map((profile, index) => [profile.id, `P${index + 1}`]));

    const participants = profiles.map((profile) => ({
        id: shortIdOf.get(profile.id),
        name: profile.name,
        roleType: profile.roleType,
        narrativeRole: profile.narrativeRole,
        background: profile.background,
        motivations: profile.motivations,
        obligations: profile.obligations,
        ethicalTensions: profile.ethicalTensions,
        characterArc: profile.characterArc,
        relatedTo: profile.relationships
            .map((rel) => shortIdOf.get(rel.targetId))
            .filter((id): id is string => id !== undefined),
    }));

    const lines = [
        caseId ? `Case: ${caseId}` : 'Case: (unnamed)',
        timeline
            ? `Timeline: ${timeline.entries.length} moments, ${timeline.totalActions} actions, ${timeline.totalEvents} events. ${timeline.durationDescription}.`
            : 'Timeline: not available.',
        '',
        'Participants:',
        JSON.stringify(participants, null, 2),
        '',
        'Return JSON of the form:',
        '{"profiles": [{"id": "P1", "background": "...", "characterArc": "..."}], "teachingNotes": ["..."]}',
    ];
    return lines.join('\n');
}

/**
 * Parse the first JSON object in a model answer, tolerating code fences and surrounding prose.
 */
export function extractJsonObject(text: string): unknown {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
        throw new EnrichmentError('Enrichment response contains no JSON object');
    }

    try {
        const parsed: unknown = JSON.parse(text.slice(start, end + 1));
        return parsed;
    } catch (error) {
        throw new EnrichmentError(`Enrichment response is not valid JSON: ${describeError(error)}`, error);
    }
}
