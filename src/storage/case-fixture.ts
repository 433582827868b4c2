import fs from 'node:fs';
import { z } from 'zod';
import { StorageError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { SqliteEntityStore } from './database.js';

const EntityRecordSchema = z.object({
    id: z.string().min(1),
    label: z.string().min(1),
    type: z.string().min(1),
    definition: z.string().nullable().optional(),
    properties: z.record(z.unknown()).optional(),
    extractionSessionId: z.string().nullable().optional(),
    isPublished: z.boolean().optional(),
});

const TimepointSchema = z.object({
    label: z.string().min(1),
    isInterval: z.boolean().default(false),
    duration: z.string().nullable().optional(),
});

const ExtractionRecordSchema = z.object({
    sessionId: z.string().min(1),
    stageNumber: z.number().int().min(1).max(4),
    sectionType: z.string().nullable().optional(),
    conceptType: z.string().nullable().optional(),
});

/**
 * JSON file accepted by `scenario-synth import`.
 */
export const CaseFixtureSchema = z.object({
    caseId: z.string().min(1),
    title: z.string().min(1),
    workingEntities: z.array(EntityRecordSchema).default([]),
    committedEntities: z.array(EntityRecordSchema).default([]),
    timepoints: z.array(TimepointSchema).default([]),
    temporalConsistency: z.record(z.unknown()).nullable().optional(),
    extractionRecords: z.array(ExtractionRecordSchema).default([]),
});

export type CaseFixture = z.infer<typeof CaseFixtureSchema>;

/**
 * Read and validate a case fixture file.
 */
export function readCaseFixture(filePath: string): CaseFixture {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new StorageError(`Cannot read case fixture ${filePath}: ${describeError(error)}`, error);
    }

    const parsed = CaseFixtureSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new StorageError(`Invalid case fixture ${filePath}: ${issues.join('; ')}`, parsed.error);
    }
    return parsed.data;
}

/**
 * Write a fixture into the store in one transaction.
 */
export function importCaseFixture(store: SqliteEntityStore, fixture: CaseFixture): void {
    const db = store.getRawDb();
    const importAll = db.transaction(() => {
        store.insertCase(fixture.caseId, fixture.title);
        store.insertWorkingEntities(fixture.caseId, fixture.workingEntities);
        store.insertCommittedEntities(fixture.caseId, fixture.committedEntities);
        store.insertTimepoints(fixture.caseId, fixture.timepoints);
        if (fixture.temporalConsistency) {
            store.setTemporalConsistency(fixture.caseId, fixture.temporalConsistency);
        }
        for (const record of fixture.extractionRecords) {
            store.recordExtraction(fixture.caseId, record);
        }
    });

    importAll();

    getLogger().info(
        {
            caseId: fixture.caseId,
            working: fixture.workingEntities.length,
            committed: fixture.committedEntities.length,
            timepoints: fixture.timepoints.length,
        },
        'Case imported'
    );
}
