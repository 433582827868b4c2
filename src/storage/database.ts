import Database from 'better-sqlite3';
import { EntityProperties } from '../model/entity-properties.js';
import { normalizeEntityType } from '../model/entity-type.js';
import {
    STAGE_NUMBERS,
    STAGE_ORDER,
    type CaseMetadata,
    type Entity,
    type EntitySource,
    type EntityStore,
    type StageName,
    type StageProvenance,
    type TemporalConsistency,
    type Timepoint,
} from '../types/index.js';
import { NotFoundError, ScenarioError, StorageError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/** Concept type recorded by the whole-case synthesis stage */
export const SYNTHESIS_CONCEPT_TYPE = 'whole_case_synthesis';

/**
 * SQLite schema migration v1.
 * Cases, both entity tiers, timepoints and extraction provenance.
 */
const MIGRATION_V1 = `
-- Cases: document metadata
CREATE TABLE IF NOT EXISTS cases (
  case_id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Working tier: everything the extraction passes recorded
CREATE TABLE IF NOT EXISTS working_entities (
  row_id INTEGER PRIMARY KEY,
  case_id TEXT NOT NULL REFERENCES cases(case_id),
  entity_uri TEXT NOT NULL,
  label TEXT NOT NULL,
  entity_type TEXT NOT NULL,
  definition TEXT,
  properties_json TEXT NOT NULL DEFAULT '{}',
  extraction_session_id TEXT,
  is_published INTEGER NOT NULL DEFAULT 0
);

-- Committed tier: entities promoted to the durable ontology store
CREATE TABLE IF NOT EXISTS committed_entities (
  row_id INTEGER PRIMARY KEY,
  case_id TEXT NOT NULL REFERENCES cases(case_id),
  entity_uri TEXT NOT NULL,
  label TEXT NOT NULL,
  entity_type TEXT NOT NULL,
  definition TEXT,
  properties_json TEXT NOT NULL DEFAULT '{}'
);

-- Timepoints from the temporal-dynamics pass, in chronological order
CREATE TABLE IF NOT EXISTS timepoints (
  row_id INTEGER PRIMARY KEY,
  case_id TEXT NOT NULL REFERENCES cases(case_id),
  position INTEGER NOT NULL,
  label TEXT NOT NULL,
  is_interval INTEGER NOT NULL DEFAULT 0,
  duration TEXT
);

-- Opaque consistency annotation, one per case
CREATE TABLE IF NOT EXISTS temporal_consistency (
  case_id TEXT PRIMARY KEY REFERENCES cases(case_id),
  payload_json TEXT NOT NULL
);

-- Extraction provenance: one row per session/stage/section/concept
CREATE TABLE IF NOT EXISTS extraction_records (
  record_id INTEGER PRIMARY KEY,
  case_id TEXT NOT NULL REFERENCES cases(case_id),
  session_id TEXT NOT NULL,
  stage_number INTEGER NOT NULL,
  section_type TEXT,
  concept_type TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_working_case ON working_entities(case_id);
CREATE INDEX IF NOT EXISTS idx_committed_case ON committed_entities(case_id);
CREATE INDEX IF NOT EXISTS idx_timepoints_case ON timepoints(case_id, position);
CREATE INDEX IF NOT EXISTS idx_extraction_case ON extraction_records(case_id);
`;

// ─── Row shapes ───────────────────────────────────────────

interface CaseRow {
    case_id: string;
    title: string;
}

interface EntityRow {
    entity_uri: string;
    label: string;
    entity_type: string;
    definition: string | null;
    properties_json: string;
}

interface WorkingEntityRow extends EntityRow {
    extraction_session_id: string | null;
    is_published: number;
}

interface TimepointRow {
    label: string;
    is_interval: number;
    duration: string | null;
}

interface ExtractionRecordRow {
    session_id: string;
    stage_number: number;
    section_type: string | null;
    concept_type: string | null;
}

// ─── Insert shapes (import command and tests) ─────────────

/**
 * Entity as written by the import command. `type` is the raw stored label;
 * it is normalized on read.
 */
export interface EntityRecordInput {
    id: string;
    label: string;
    type: string;
    definition?: string | null;
    properties?: Record<string, unknown>;
    extractionSessionId?: string | null;
    isPublished?: boolean;
}

export interface ExtractionRecordInput {
    sessionId: string;
    stageNumber: number;
    sectionType?: string | null;
    conceptType?: string | null;
}

/**
 * Entity store backed by better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, the read side used by the
 * pipeline and the insert helpers used by `import`.
 */
export class SqliteEntityStore implements EntityStore {
    readonly name = 'sqlite';
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = openDatabase(dbPath);

        try {
            // In-memory databases cannot use WAL
            if (dbPath !== ':memory:') {
                this.db.pragma('journal_mode = WAL');
            }
            this.db.pragma('foreign_keys = ON');
            this.migrate();
        } catch (error) {
            this.db.close();
            throw new StorageError(`Failed to initialize database at ${dbPath}: ${describeError(error)}`, error);
        }

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion === 'number' && currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Database migrated to v1');
        }
    }

    // ─── EntityStore ──────────────────────────────────────────

    readCaseMetadata(caseId: string): CaseMetadata {
        const row = this.read('read case metadata', () =>
            this.db.prepare<[string], CaseRow>('SELECT case_id, title FROM cases WHERE case_id = ?').get(caseId)
        );
        if (!row) throw new NotFoundError(caseId);
        return { caseId: row.case_id, title: row.title };
    }

    readWorkingEntities(caseId: string): Entity[] {
        const rows = this.read('read working entities', () =>
            this.db.prepare<[string], WorkingEntityRow>(`
      SELECT entity_uri, label, entity_type, definition, properties_json, extraction_session_id, is_published
      FROM working_entities WHERE case_id = ? ORDER BY row_id
    `).all(caseId)
        );

        const entities: Entity[] = [];
        for (const row of rows) {
            const entity = this.toEntity(row, 'working');
            if (!entity) continue;
            entities.push({
                ...entity,
                extractionSessionId: row.extraction_session_id,
                isPublished: row.is_published === 1,
            });
        }
        return entities;
    }

    readCommittedEntities(caseId: string): Entity[] {
        const rows = this.read('read committed entities', () =>
            this.db.prepare<[string], EntityRow>(`
      SELECT entity_uri, label, entity_type, definition, properties_json
      FROM committed_entities WHERE case_id = ? ORDER BY row_id
    `).all(caseId)
        );

        return rows
            .map((row) => this.toEntity(row, 'committed'))
            .filter((entity): entity is Entity => entity !== null);
    }

    readTimepoints(caseId: string): Timepoint[] {
        const rows = this.read('read timepoints', () =>
            this.db.prepare<[string], TimepointRow>(
                'SELECT label, is_interval, duration FROM timepoints WHERE case_id = ? ORDER BY position, row_id'
            ).all(caseId)
        );

        return rows.map((row) => ({
            label: row.label,
            isInterval: row.is_interval === 1,
            duration: row.duration,
        }));
    }

    readTemporalConsistency(caseId: string): TemporalConsistency | null {
        const row = this.read('read temporal consistency', () =>
            this.db.prepare<[string], { payload_json: string }>(
                'SELECT payload_json FROM temporal_consistency WHERE case_id = ?'
            ).get(caseId)
        );
        if (!row) return null;

        const parsed = parseJson(row.payload_json);
        if (!isRecord(parsed)) {
            getLogger().warn({ caseId }, 'Ignoring malformed temporal consistency record');
            return null;
        }
        return parsed;
    }

    readStageProvenance(caseId: string): StageProvenance {
        const rows = this.read('read extraction provenance', () =>
            this.db.prepare<[string], ExtractionRecordRow>(`
      SELECT session_id, stage_number, section_type, concept_type
      FROM extraction_records WHERE case_id = ? ORDER BY record_id
    `).all(caseId)
        );

        const sessions = new Set<string>();
        const recorded = new Set<StageName>();
        const sections = new Map<StageName, Set<string>>();
        let synthesisRecorded = false;

        for (const row of rows) {
            sessions.add(row.session_id);

            const stage = STAGE_ORDER.find((s) => STAGE_NUMBERS[s] === row.stage_number);
            if (!stage) continue;
            recorded.add(stage);

            if (stage === 'synthesis' && row.concept_type === SYNTHESIS_CONCEPT_TYPE) {
                synthesisRecorded = true;
            }
            if (row.section_type) {
                const covered = sections.get(stage) ?? new Set<string>();
                covered.add(row.section_type);
                sections.set(stage, covered);
            }
        }

        const sectionsByStage: Partial<Record<StageName, string[]>> = {};
        for (const [stage, covered] of sections) {
            sectionsByStage[stage] = [...covered];
        }

        return {
            extractionSessions: [...sessions],
            stagesRecorded: STAGE_ORDER.filter((stage) => recorded.has(stage)),
            sectionsByStage,
            synthesisRecorded,
        };
    }

    // ─── Inserts ──────────────────────────────────────────────

    insertCase(caseId: string, title: string): void {
        this.db.prepare(`
      INSERT INTO cases (case_id, title) VALUES (?, ?)
      ON CONFLICT(case_id) DO UPDATE SET title = excluded.title
    `).run(caseId, title);
    }

    /**
     * Insert multiple working-tier entities in a single transaction.
     */
    insertWorkingEntities(caseId: string, entities: readonly EntityRecordInput[]): void {
        const stmt = this.db.prepare(`
      INSERT INTO working_entities (case_id, entity_uri, label, entity_type, definition, properties_json, extraction_session_id, is_published)
      VALUES (@caseId, @id, @label, @type, @definition, @propertiesJson, @sessionId, @isPublished)
    `);

        const insertAll = this.db.transaction((rows: readonly EntityRecordInput[]) => {
            for (const entity of rows) {
                stmt.run({
                    caseId,
                    id: entity.id,
                    label: entity.label,
                    type: entity.type,
                    definition: entity.definition ?? null,
                    propertiesJson: JSON.stringify(entity.properties ?? {}),
                    sessionId: entity.extractionSessionId ?? null,
                    isPublished: entity.isPublished ? 1 : 0,
                });
            }
        });

        insertAll(entities);
    }

    /**
     * Insert multiple committed-tier entities in a single transaction.
     */
    insertCommittedEntities(caseId: string, entities: readonly EntityRecordInput[]): void {
        const stmt = this.db.prepare(`
      INSERT INTO committed_entities (case_id, entity_uri, label, entity_type, definition, properties_json)
      VALUES (@caseId, @id, @label, @type, @definition, @propertiesJson)
    `);

        const insertAll = this.db.transaction((rows: readonly EntityRecordInput[]) => {
            for (const entity of rows) {
                stmt.run({
                    caseId,
                    id: entity.id,
                    label: entity.label,
                    type: entity.type,
                    definition: entity.definition ?? null,
                    propertiesJson: JSON.stringify(entity.properties ?? {}),
                });
            }
        });

        insertAll(entities);
    }

    /**
     * Replace the case's timepoints; list order is chronological order.
     */
    insertTimepoints(caseId: string, timepoints: readonly Timepoint[]): void {
        const clear = this.db.prepare('DELETE FROM timepoints WHERE case_id = ?');
        const stmt = this.db.prepare(`
      INSERT INTO timepoints (case_id, position, label, is_interval, duration)
      VALUES (?, ?, ?, ?, ?)
    `);

        const replaceAll = this.db.transaction((rows: readonly Timepoint[]) => {
            clear.run(caseId);
            rows.forEach((tp, index) => {
                stmt.run(caseId, index, tp.label, tp.isInterval ? 1 : 0, tp.duration ?? null);
            });
        });

        replaceAll(timepoints);
    }

    setTemporalConsistency(caseId: string, payload: TemporalConsistency): void {
        this.db.prepare(`
      INSERT INTO temporal_consistency (case_id, payload_json) VALUES (?, ?)
      ON CONFLICT(case_id) DO UPDATE SET payload_json = excluded.payload_json
    `).run(caseId, JSON.stringify(payload));
    }

    recordExtraction(caseId: string, record: ExtractionRecordInput): void {
        this.db.prepare(`
      INSERT INTO extraction_records (case_id, session_id, stage_number, section_type, concept_type)
      VALUES (?, ?, ?, ?, ?)
    `).run(caseId, record.sessionId, record.stageNumber, record.sectionType ?? null, record.conceptType ?? null);
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Get the raw better-sqlite3 database instance.
     * Used for advanced queries and testing.
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Run a read, turning driver failures into `StorageError`.
     */
    private read<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            if (error instanceof ScenarioError) throw error;
            throw new StorageError(`Failed to ${operation}: ${describeError(error)}`, error);
        }
    }

    private toEntity(row: EntityRow, source: EntitySource): Entity | null {
        const type = normalizeEntityType(row.entity_type);
        if (!type) {
            getLogger().debug({ id: row.entity_uri, rawType: row.entity_type, source }, 'Skipping entity with unknown type');
            return null;
        }

        return {
            id: row.entity_uri,
            label: row.label,
            type,
            definition: row.definition,
            properties: EntityProperties.fromRecord(parseJson(row.properties_json)),
            source,
        };
    }
}

function openDatabase(dbPath: string): Database.Database {
    try {
        return new Database(dbPath);
    } catch (error) {
        throw new StorageError(`Failed to open database at ${dbPath}: ${describeError(error)}`, error);
    }
}

function parseJson(text: string): unknown {
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch (error) {
        getLogger().debug({ error: describeError(error) }, 'Unparsable JSON column');
        return null;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
