import type {
    CaseMetadata,
    Entity,
    EntityStore,
    StageProvenance,
    TemporalConsistency,
    Timepoint,
} from '../../types/index.js';
import { NotFoundError } from '../../utils/errors.js';

export interface FakeCase {
    title?: string;
    working?: Entity[];
    committed?: Entity[];
    timepoints?: Timepoint[];
    temporalConsistency?: TemporalConsistency | null;
    provenance?: Partial<StageProvenance>;
}

/**
 * In-memory EntityStore. `failWith` makes every read throw the given error.
 */
export class FakeEntityStore implements EntityStore {
    readonly name = 'fake';
    failWith: Error | null = null;
    readonly calls: string[] = [];

    constructor(private readonly cases: Record<string, FakeCase> = {}) { }

    readCaseMetadata(caseId: string): CaseMetadata {
        const found = this.lookup('readCaseMetadata', caseId);
        return { caseId, title: found.title ?? `Case ${caseId}` };
    }

    readWorkingEntities(caseId: string): Entity[] {
        return [...(this.lookup('readWorkingEntities', caseId).working ?? [])];
    }

    readCommittedEntities(caseId: string): Entity[] {
        return [...(this.lookup('readCommittedEntities', caseId).committed ?? [])];
    }

    readTimepoints(caseId: string): Timepoint[] {
        return [...(this.lookup('readTimepoints', caseId).timepoints ?? [])];
    }

    readTemporalConsistency(caseId: string): TemporalConsistency | null {
        return this.lookup('readTemporalConsistency', caseId).temporalConsistency ?? null;
    }

    readStageProvenance(caseId: string): StageProvenance {
        const provenance = this.lookup('readStageProvenance', caseId).provenance ?? {};
        return {
            extractionSessions: provenance.extractionSessions ?? [],
            stagesRecorded: provenance.stagesRecorded ?? [],
            sectionsByStage: provenance.sectionsByStage ?? {},
            synthesisRecorded: provenance.synthesisRecorded ?? false,
        };
    }

    private lookup(method: string, caseId: string): FakeCase {
        this.calls.push(method);
        if (this.failWith) throw this.failWith;
        const found = this.cases[caseId];
        if (!found) throw new NotFoundError(caseId);
        return found;
    }
}
