/**
 * Narrative role tag assigned by the participant mapper.
 * A hint only; the scored protagonist selection is authoritative.
 */
export type NarrativeRole = 'protagonist' | 'antagonist' | 'supporting';

export interface ParticipantRelationship {
    /** Identifier of the related entity (participant or otherwise) */
    targetId: string;
    /** Relationship kind as declared upstream, e.g. "serves_client" */
    kind: string;
}

/**
 * A character derived from one Role entity.
 */
export interface ParticipantProfile {
    /** Profile identifier (the source entity id unless overridden) */
    id: string;
    /** URI of the Role entity the profile was derived from */
    sourceEntityUri: string;
    name: string;
    roleType: string;
    background: string;
    expertise: string[];
    qualifications: string[];
    /** Never empty */
    motivations: string[];
    goals: string[];
    obligations: string[];
    constraints: string[];
    ethicalTensions: string[];
    characterArc: string;
    narrativeRole: NarrativeRole;
    relationships: ParticipantRelationship[];
    /** Sequence numbers of timeline entries where this participant acts */
    timelineAppearances: number[];
    /** Whether the narrative enrichment pass rewrote text fields */
    enriched: boolean;
}

/**
 * Symmetric adjacency: identifier → connected identifiers (sorted).
 */
export type RelationshipGraph = Readonly<Record<string, readonly string[]>>;

export interface ParticipantMappingResult {
    participants: readonly ParticipantProfile[];
    relationshipGraph: RelationshipGraph;
    /** Highest-scoring participant, null for empty input */
    protagonist: string | null;
    /** Every other participant id, in input order */
    supportingCast: readonly string[];
    /** Instructor-facing notes from the enrichment pass (empty without it) */
    teachingNotes: readonly string[];
    protagonistScores: Readonly<Record<string, number>>;
}
