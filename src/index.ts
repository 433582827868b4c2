/**
 * Library entry point.
 */
export * from './types/index.js';
export { EntityProperties, normalizeKey } from './model/entity-properties.js';
export { normalizeEntityType } from './model/entity-type.js';

export { DataCollector, type CollectedCaseData } from './collector/data-collector.js';
export { mergeEntityTiers, partitionByType, countsByType } from './collector/merge.js';

export { TimelineConstructor, assembleTimeline } from './timeline/timeline-constructor.js';
export { computePhaseBoundaries, segmentPhases, type PhaseBoundaries } from './timeline/phases.js';
export { estimateDuration } from './timeline/duration.js';

export { ParticipantMapper, type ParticipantMapperOptions, type MapParticipantsOptions } from './participants/participant-mapper.js';
export { buildProfile } from './participants/profile-builder.js';
export { buildRelationshipGraph } from './participants/relationship-graph.js';
export { scoreProtagonist, selectProtagonist, type ProtagonistSelection } from './participants/scoring.js';
export { type KeywordRule, matchAll } from './participants/rules.js';

export { NoopNarrativeEnricher } from './enrichment/noop-enricher.js';
export { LlmNarrativeEnricher, type LlmEnricherOptions } from './enrichment/llm-enricher.js';
export { OpenAiCompatibleProvider } from './enrichment/openai-provider.js';
export { createNarrativeEnricher } from './enrichment/factory.js';

export { ScenarioOrchestrator, generateScenarioCore, type ScenarioOrchestratorOptions } from './builder/scenario-orchestrator.js';

export { SqliteEntityStore, type EntityRecordInput, type ExtractionRecordInput } from './storage/database.js';
export { CaseFixtureSchema, readCaseFixture, importCaseFixture, type CaseFixture } from './storage/case-fixture.js';

export {
    ScenarioError,
    NotFoundError,
    StorageError,
    EligibilityError,
    EnrichmentError,
    UnexpectedError,
    type ErrorCategory,
} from './utils/errors.js';
export { resolveConfig, mergeConfig, type ConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
