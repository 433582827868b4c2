import {
    EntityType,
    type Entity,
    type EntitySet,
    type EntityStore,
    type ScenarioTimeline,
    type TemporalConsistency,
    type TimelineElement,
    type TimelineEntry,
    type Timepoint,
} from '../types/index.js';
import { mergeEntityTiers } from '../collector/merge.js';
import { getLogger } from '../utils/logger.js';
import { NO_TIMELINE_DATA, estimateDuration } from './duration.js';
import { computePhaseBoundaries, phaseOf, segmentPhases } from './phases.js';

const TEMPORAL_TYPES = [EntityType.ACTION, EntityType.EVENT] as const;

/**
 * Join actions and events onto the upstream timepoint list and segment it into phases.
 * Timepoints are taken in input order; nothing is reordered.
 *
 * A marker joins a timepoint when both are equal after trimming surrounding
 * whitespace. The comparison is otherwise exact and case-sensitive.
 */
export function assembleTimeline(
    timepoints: readonly Timepoint[],
    entities: EntitySet,
    temporalConsistency: TemporalConsistency | null = null
): ScenarioTimeline {
    // Trimmed marker text → entities carrying it
    const byMarker = new Map<string, Entity[]>();
    for (const type of TEMPORAL_TYPES) {
        for (const entity of entities.get(type) ?? []) {
            const marker = entity.properties.getTemporalMarker();
            if (marker === undefined) continue;
            const bucket = byMarker.get(marker) ?? [];
            bucket.push(entity);
            byMarker.set(marker, bucket);
        }
    }

    const boundaries = computePhaseBoundaries(timepoints.length);
    const placed = new Map<string, Entity>();

    const entries: TimelineEntry[] = timepoints.map((tp, index) => {
        const attached = byMarker.get(tp.label.trim()) ?? [];
        for (const entity of attached) placed.set(entity.id, entity);

        return Object.freeze({
            sequence: index + 1,
            label: tp.label,
            duration: tp.duration ?? null,
            isInterval: tp.isInterval,
            elements: Object.freeze(attached.map(toElement)),
            phase: phaseOf(index, boundaries),
        });
    });

    const unplaced: string[] = [];
    for (const [marker, bucket] of byMarker) {
        if (timepoints.some((tp) => tp.label.trim() === marker)) continue;
        unplaced.push(...bucket.map((entity) => entity.id));
    }

    let totalActions = 0;
    let totalEvents = 0;
    for (const entity of placed.values()) {
        if (entity.type === EntityType.ACTION) totalActions++;
        else totalEvents++;
    }

    const durationDescription = entries.length === 0
        ? NO_TIMELINE_DATA
        : estimateDuration([...timepoints.map((tp) => tp.label), ...byMarker.keys()]);

    return Object.freeze({
        entries: Object.freeze(entries),
        phases: Object.freeze(segmentPhases(entries.length)),
        totalActions,
        totalEvents,
        unplaced: Object.freeze(unplaced),
        durationDescription,
        temporalConsistency,
    });
}

function toElement(entity: Entity): TimelineElement {
    return {
        id: entity.id,
        label: entity.label,
        type: entity.type === EntityType.ACTION ? EntityType.ACTION : EntityType.EVENT,
        agent: entity.type === EntityType.ACTION ? entity.properties.getAgent() ?? null : null,
    };
}

/**
 * Builds the scenario timeline for a case from the entity store.
 */
export class TimelineConstructor {
    constructor(private readonly store: EntityStore) { }

    /**
     * Build the timeline. When `merged` is omitted both tiers are loaded and merged here.
     * An empty timepoint list yields an empty timeline, not an error.
     */
    buildTimeline(caseId: string, merged?: EntitySet): ScenarioTimeline {
        const timepoints = this.store.readTimepoints(caseId);
        const entities = merged ?? mergeEntityTiers(
            this.store.readWorkingEntities(caseId),
            this.store.readCommittedEntities(caseId)
        );
        const consistency = this.store.readTemporalConsistency(caseId);

        const timeline = assembleTimeline(timepoints, entities, consistency);

        getLogger().info(
            {
                caseId,
                entries: timeline.entries.length,
                actions: timeline.totalActions,
                events: timeline.totalEvents,
                unplaced: timeline.unplaced.length,
            },
            'Timeline built'
        );
        if (timeline.unplaced.length > 0) {
            getLogger().debug({ caseId, unplaced: timeline.unplaced }, 'Entities with unmatched temporal markers');
        }

        return timeline;
    }
}
