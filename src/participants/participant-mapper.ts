import type {
    Entity,
    EnrichmentOutput,
    EnrichmentRequest,
    NarrativeEnricher,
    ParticipantMappingResult,
    ParticipantProfile,
    ScenarioTimeline,
} from '../types/index.js';
import { DEFAULT_CONFIG, EntityType } from '../types/index.js';
import { NoopNarrativeEnricher } from '../enrichment/noop-enricher.js';
import { EnrichmentOutputSchema } from '../enrichment/schema.js';
import { EnrichmentError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { buildProfile } from './profile-builder.js';
import { buildRelationshipGraph } from './relationship-graph.js';
import { selectProtagonist } from './scoring.js';

export interface ParticipantMapperOptions {
    enricher?: NarrativeEnricher;
    /** Budget for one enrichment call */
    enrichmentTimeoutMs?: number;
}

export interface MapParticipantsOptions {
    caseId?: string;
    /** Aborts a running enrichment call (the structural result is still returned) */
    signal?: AbortSignal;
}

/**
 * Turns Role entities into participant profiles, a symmetric relationship graph
 * and a scored protagonist, then offers the result to the narrative enricher.
 */
export class ParticipantMapper {
    private readonly enricher: NarrativeEnricher;
    private readonly enrichmentTimeoutMs: number;

    constructor(options: ParticipantMapperOptions = {}) {
        this.enricher = options.enricher ?? new NoopNarrativeEnricher();
        this.enrichmentTimeoutMs = options.enrichmentTimeoutMs ?? DEFAULT_CONFIG.enrichment.timeoutMs;
    }

    async mapParticipants(
        roles: readonly Entity[],
        timeline?: ScenarioTimeline | null,
        options: MapParticipantsOptions = {}
    ): Promise<ParticipantMappingResult> {
        const profiles = roles
            .filter((entity) => entity.type === EntityType.ROLE)
            .map((entity) => buildProfile(entity, timeline));

        const selection = selectProtagonist(profiles);
        const structural: ParticipantMappingResult = {
            participants: profiles,
            relationshipGraph: buildRelationshipGraph(profiles),
            protagonist: selection.protagonist,
            supportingCast: selection.supportingCast,
            teachingNotes: [],
            protagonistScores: selection.scores,
        };

        getLogger().info(
            { caseId: options.caseId, participants: profiles.length, protagonist: selection.protagonist },
            'Participants mapped'
        );

        if (profiles.length === 0) return freezeResult(structural);

        const result = await this.enrich(structural, {
            caseId: options.caseId ?? null,
            participants: profiles,
            relationshipGraph: structural.relationshipGraph,
            timeline: timeline ?? null,
        }, options.signal);

        return freezeResult(result);
    }

    /**
     * The one place enrichment runs. Any failure leaves the structural result untouched.
     */
    private async enrich(
        structural: ParticipantMappingResult,
        request: EnrichmentRequest,
        signal?: AbortSignal
    ): Promise<ParticipantMappingResult> {
        try {
            const output = await withTimeout(
                (s) => this.enricher.enhance(request, s),
                this.enrichmentTimeoutMs,
                `Enrichment via ${this.enricher.name}`,
                signal
            );
            return applyEnrichment(structural, validateEnrichment(output, structural.participants));
        } catch (error) {
            const failure = error instanceof EnrichmentError
                ? error
                : new EnrichmentError(`Narrative enrichment failed: ${describeError(error)}`, error);
            getLogger().warn(
                { enricher: this.enricher.name, caseId: request.caseId, error: failure.toJSON() },
                'Narrative enrichment failed, keeping unenriched profiles'
            );
            return structural;
        }
    }
}

/**
 * Reject enricher output that does not fit the profiles it was given.
 */
function validateEnrichment(output: unknown, participants: readonly ParticipantProfile[]): EnrichmentOutput {
    const parsed = EnrichmentOutputSchema.safeParse(output);
    if (!parsed.success) {
        throw new EnrichmentError(`Enricher output failed validation: ${parsed.error.issues.length} issue(s)`);
    }

    const known = new Set(participants.map((p) => p.id));
    const seen = new Set<string>();
    for (const profile of parsed.data.profiles) {
        if (!known.has(profile.id)) {
            throw new EnrichmentError(`Enricher returned unknown profile ${profile.id}`);
        }
        if (seen.has(profile.id)) {
            throw new EnrichmentError(`Enricher returned profile ${profile.id} twice`);
        }
        seen.add(profile.id);
    }

    return parsed.data;
}

function applyEnrichment(structural: ParticipantMappingResult, output: EnrichmentOutput): ParticipantMappingResult {
    const byId = new Map(output.profiles.map((text) => [text.id, text]));

    const participants = structural.participants.map((profile) => {
        const text = byId.get(profile.id);
        if (!text) return profile;

        const background = text.background?.trim();
        const characterArc = text.characterArc?.trim();
        if (!background && !characterArc) return profile;

        return {
            ...profile,
            background: background || profile.background,
            characterArc: characterArc || profile.characterArc,
            enriched: true,
        };
    });

    return {
        ...structural,
        participants,
        teachingNotes: output.teachingNotes.map((note) => note.trim()).filter((note) => note.length > 0),
    };
}

function freezeResult(result: ParticipantMappingResult): ParticipantMappingResult {
    return Object.freeze({
        ...result,
        participants: Object.freeze(result.participants.map((profile) => Object.freeze(profile))),
        supportingCast: Object.freeze([...result.supportingCast]),
        teachingNotes: Object.freeze([...result.teachingNotes]),
        protagonistScores: Object.freeze({ ...result.protagonistScores }),
    });
}
