import type { ParticipantProfile, RelationshipGraph } from './participant.js';
import type { ScenarioTimeline } from './timeline.js';

/**
 * Input handed to a narrative enricher.
 */
export interface EnrichmentRequest {
    caseId: string | null;
    participants: readonly ParticipantProfile[];
    relationshipGraph: RelationshipGraph;
    timeline: ScenarioTimeline | null;
}

/**
 * Rewritten text for one profile. Omitted fields keep their original value.
 */
export interface EnrichedProfileText {
    id: string;
    background?: string;
    characterArc?: string;
}

export interface EnrichmentOutput {
    profiles: EnrichedProfileText[];
    teachingNotes: string[];
}

/**
 * Optional narrative-quality pass over participant profiles.
 * Implementations may fail freely: the mapper treats every failure as
 * "no enrichment" and keeps the structural result.
 */
export interface NarrativeEnricher {
    readonly name: string;

    enhance(request: EnrichmentRequest, signal: AbortSignal): Promise<EnrichmentOutput>;
}
