/**
 * Barrel export for all shared types.
 */
export { EntityType, ENTITY_TYPE_ORDER } from './entity.js';
export type { Entity, EntitySet, EntitySource, PropertyValue, RelationshipDeclaration } from './entity.js';
export { PHASE_ORDER } from './timeline.js';
export type {
    PhaseName,
    Timepoint,
    TimelineElement,
    TimelineEntry,
    TimelinePhase,
    TemporalConsistency,
    ScenarioTimeline,
} from './timeline.js';
export type {
    NarrativeRole,
    ParticipantRelationship,
    ParticipantProfile,
    RelationshipGraph,
    ParticipantMappingResult,
} from './participant.js';
export { STAGE_ORDER, STAGE_NUMBERS, PASS_ENTITY_TYPES, STAGE_DISPLAY_NAMES } from './eligibility.js';
export type { StageName, StageStatus, EligibilityReport } from './eligibility.js';
export type { EntityStore, CaseMetadata, StageProvenance } from './entity-store.js';
export type { NarrativeEnricher, EnrichmentRequest, EnrichmentOutput, EnrichedProfileText } from './enrichment.js';
export { DEFAULT_CONFIG, DEFAULT_BASE_URLS } from './config.js';
export type {
    ScenarioSynthConfig,
    LogLevel,
    LlmProviderName,
    EnrichmentConfig,
    PipelineConfig,
} from './config.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
export { STAGE_PROGRESS } from './pipeline.js';
export type {
    PipelineStage,
    ProgressEvent,
    ProgressCallback,
    StageSummary,
    ScenarioCoreResult,
} from './pipeline.js';
