import type { Entity } from './entity.js';
import type { StageName } from './eligibility.js';
import type { TemporalConsistency, Timepoint } from './timeline.js';

/**
 * Case metadata from the document store.
 */
export interface CaseMetadata {
    caseId: string;
    title: string;
}

/**
 * Which extraction sessions ran for a case and what they covered.
 */
export interface StageProvenance {
    /** Distinct session ids, in first-recorded order */
    extractionSessions: string[];
    /** Stages with at least one extraction record, in stage order */
    stagesRecorded: StageName[];
    /** Case sections (facts, discussion, ...) recorded per stage */
    sectionsByStage: Partial<Record<StageName, string[]>>;
    /** Whether a whole-case synthesis record exists */
    synthesisRecorded: boolean;
}

/**
 * Read-only accessor over the dual-tier entity records.
 * Implementations throw `NotFoundError` from `readCaseMetadata` for unknown
 * cases and `StorageError` from any method when the backing store fails.
 */
export interface EntityStore {
    /** Human-readable store name (for logs) */
    readonly name: string;

    readCaseMetadata(caseId: string): CaseMetadata;

    /** Every working-tier entity for the case, regardless of review/selection flags */
    readWorkingEntities(caseId: string): Entity[];

    /** Entities promoted into the durable ontology store */
    readCommittedEntities(caseId: string): Entity[];

    /** Timepoints in chronological (input) order */
    readTimepoints(caseId: string): Timepoint[];

    readTemporalConsistency(caseId: string): TemporalConsistency | null;

    readStageProvenance(caseId: string): StageProvenance;
}
