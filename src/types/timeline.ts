import type { EntityType } from './entity.js';

/**
 * Pedagogical timeline phases, in narrative order.
 */
export type PhaseName = 'introduction' | 'development' | 'resolution';

export const PHASE_ORDER: readonly PhaseName[] = ['introduction', 'development', 'resolution'];

/**
 * A timepoint as recorded by the temporal-dynamics pass.
 */
export interface Timepoint {
    /** Human-readable label, also the join key for entity temporal markers */
    label: string;
    isInterval: boolean;
    /** ISO 8601 duration if available */
    duration?: string | null;
}

/**
 * Compact view of an action/event attached to a timeline entry.
 */
export interface TimelineElement {
    id: string;
    label: string;
    type: EntityType.ACTION | EntityType.EVENT;
    /** Agent declared on an action, when any */
    agent: string | null;
}

export interface TimelineEntry {
    /** 1-based, gapless */
    sequence: number;
    label: string;
    duration: string | null;
    isInterval: boolean;
    elements: readonly TimelineElement[];
    phase: PhaseName;
}

export interface TimelinePhase {
    name: PhaseName;
    description: string;
    /** Index into `entries` of the first entry in the phase */
    startIndex: number;
    /** Exclusive end index */
    endIndex: number;
    entryCount: number;
}

/**
 * Opaque temporal-consistency annotation produced upstream; passed through unchanged.
 */
export type TemporalConsistency = Readonly<Record<string, unknown>>;

export interface ScenarioTimeline {
    entries: readonly TimelineEntry[];
    /** Only phases that hold at least one entry */
    phases: Readonly<Partial<Record<PhaseName, TimelinePhase>>>;
    totalActions: number;
    totalEvents: number;
    /** Actions/events whose temporal marker matched no timepoint */
    unplaced: readonly string[];
    durationDescription: string;
    temporalConsistency: TemporalConsistency | null;
}
