import type { EntityProperties } from '../model/entity-properties.js';

/**
 * Entity types produced by the extraction passes.
 *
 * Core (extraction passes 1-3):
 *   Role, State, Resource, Principle, Obligation, Constraint, Capability,
 *   Action, Event
 *
 * Synthesis (whole-case analysis):
 *   Question, Conclusion
 */
export enum EntityType {
    // Pass 1: contextual framework
    ROLE = 'Role',
    STATE = 'State',
    RESOURCE = 'Resource',

    // Pass 2: normative requirements
    PRINCIPLE = 'Principle',
    OBLIGATION = 'Obligation',
    CONSTRAINT = 'Constraint',
    CAPABILITY = 'Capability',

    // Pass 3: temporal dynamics
    ACTION = 'Action',
    EVENT = 'Event',

    // Synthesis
    QUESTION = 'Question',
    CONCLUSION = 'Conclusion',
}

/** Canonical ordering used whenever entity sets are emitted. */
export const ENTITY_TYPE_ORDER: readonly EntityType[] = Object.values(EntityType);

/** Provenance tier an entity was read from */
export type EntitySource = 'working' | 'committed';

/**
 * A relationship declared on an entity (typically a Role),
 * e.g. `{ type: 'serves_client', target: 'case:12#ClientW' }`.
 */
export interface RelationshipDeclaration {
    type: string;
    target: string;
}

/**
 * A single property value. Most properties are plain strings; structured
 * declarations (relationships) are flat string records.
 */
export type PropertyValue = string | Readonly<Record<string, string>>;

/**
 * Entity interface: one extracted fact about a case.
 */
export interface Entity {
    /** URI-like identifier, unique within a case */
    id: string;

    /** Human-readable label */
    label: string;

    type: EntityType;

    /** Free-text definition (nullable) */
    definition: string | null;

    /** Typed property bag */
    properties: EntityProperties;

    source: EntitySource;

    /** Set to 'committed_ontology' when the entity entered a merged set through the committed tier only */
    enrichmentSource?: 'committed_ontology';

    /** Extraction session that produced the working row */
    extractionSessionId?: string | null;

    /** Working rows only: whether the row was promoted to the committed tier */
    isPublished?: boolean;
}

/**
 * Entities partitioned by type.
 */
export type EntitySet = ReadonlyMap<EntityType, readonly Entity[]>;
