import { EntityType } from './entity.js';

/**
 * Stages that must be complete before synthesis may run.
 */
export type StageName = 'pass1' | 'pass2' | 'pass3' | 'synthesis';

export const STAGE_ORDER: readonly StageName[] = ['pass1', 'pass2', 'pass3', 'synthesis'];

/** Provenance stage number recorded by the extraction producer for each stage */
export const STAGE_NUMBERS: Readonly<Record<StageName, number>> = {
    pass1: 1,
    pass2: 2,
    pass3: 3,
    synthesis: 4,
};

/** Entity types whose presence marks an extraction pass as complete */
export const PASS_ENTITY_TYPES: Readonly<Record<Exclude<StageName, 'synthesis'>, readonly EntityType[]>> = {
    pass1: [EntityType.ROLE, EntityType.STATE, EntityType.RESOURCE],
    pass2: [EntityType.PRINCIPLE, EntityType.OBLIGATION, EntityType.CONSTRAINT, EntityType.CAPABILITY],
    pass3: [EntityType.ACTION, EntityType.EVENT],
};

export const STAGE_DISPLAY_NAMES: Readonly<Record<StageName, string>> = {
    pass1: 'Pass 1 (roles, states, resources)',
    pass2: 'Pass 2 (principles, obligations, constraints, capabilities)',
    pass3: 'Pass 3 (actions, events)',
    synthesis: 'Whole-case synthesis (questions, conclusions)',
};

export interface StageStatus {
    stage: StageName;
    complete: boolean;
    entityCount: number;
    /** Case sections recorded in provenance for this stage */
    sectionsCovered: string[];
}

export interface EligibilityReport {
    caseId: string;
    eligible: boolean;
    stages: Readonly<Record<StageName, StageStatus>>;
    entityCounts: Readonly<Partial<Record<EntityType, number>>>;
    temporal: {
        available: boolean;
        actions: number;
        events: number;
    };
    synthesis: {
        questions: number;
        conclusions: number;
        synthesisRecorded: boolean;
    };
    /** Display names of incomplete stages, in stage order */
    missingStages: string[];
    summary: string;
}
