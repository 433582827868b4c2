import type { EligibilityReport } from './eligibility.js';
import type { EntityType } from './entity.js';
import type { ParticipantMappingResult } from './participant.js';
import type { ScenarioTimeline } from './timeline.js';

/**
 * Pipeline stages in execution order.
 */
export type PipelineStage =
    | 'eligibility_check'
    | 'data_collection'
    | 'timeline_construction'
    | 'participant_mapping'
    | 'decision_identification'
    | 'causal_integration'
    | 'normative_integration'
    | 'scenario_assembly'
    | 'model_generation'
    | 'validation'
    | 'complete';

/**
 * Progress percentage when a stage starts and when it finishes.
 */
export const STAGE_PROGRESS = {
    eligibility_check: [0, 5],
    data_collection: [10, 20],
    timeline_construction: [30, 35],
    participant_mapping: [40, 50],
    decision_identification: [55, 60],
    causal_integration: [65, 70],
    normative_integration: [75, 80],
    scenario_assembly: [85, 90],
    model_generation: [93, 95],
    validation: [97, 99],
    complete: [100, 100],
} as const satisfies Record<PipelineStage, readonly [number, number]>;

export interface ProgressEvent {
    caseId: string;
    /** `error` only on the final event of a failed run */
    stage: PipelineStage | 'error';
    /** Never decreases within a run */
    percent: number;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * Receives progress events. Exceptions (and rejections) it raises are logged and ignored.
 */
export type ProgressCallback = (event: ProgressEvent) => void | Promise<void>;

/**
 * Count summary reported by an extension-point stage.
 */
export interface StageSummary {
    stage: PipelineStage;
    counts: Readonly<Record<string, number>>;
}

export interface ScenarioCoreResult {
    caseId: string;
    title: string;
    eligibility: EligibilityReport;
    mergedEntityCounts: Readonly<Partial<Record<EntityType, number>>>;
    timeline: ScenarioTimeline;
    participants: ParticipantMappingResult;
    stages: readonly StageSummary[];
    durationMs: number;
}
