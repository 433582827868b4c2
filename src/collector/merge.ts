import { ENTITY_TYPE_ORDER, type Entity, type EntitySet, type EntityType } from '../types/index.js';

/**
 * Code-unit comparison; independent of the host locale.
 */
function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Order entities by label, then id.
 */
export function compareEntities(a: Entity, b: Entity): number {
    return compareStrings(a.label, b.label) || compareStrings(a.id, b.id);
}

/**
 * Group entities by type. Keys follow the canonical type order; each list is
 * sorted by label then id and frozen.
 */
export function partitionByType(entities: Iterable<Entity>): EntitySet {
    const buckets = new Map<EntityType, Entity[]>();
    for (const entity of entities) {
        const bucket = buckets.get(entity.type) ?? [];
        bucket.push(entity);
        buckets.set(entity.type, bucket);
    }

    const partitioned = new Map<EntityType, readonly Entity[]>();
    for (const type of ENTITY_TYPE_ORDER) {
        const bucket = buckets.get(type);
        if (bucket) partitioned.set(type, Object.freeze(bucket.sort(compareEntities)));
    }
    return partitioned;
}

/**
 * Merge the two tiers into one logical set.
 *
 * Every working entity is kept. A committed entity is added only when its id
 * is not already present anywhere in the merged set, and is then tagged
 * `enrichmentSource: 'committed_ontology'`. A working shadow filed under a
 * different type still suppresses its committed twin.
 */
export function mergeEntityTiers(working: readonly Entity[], committed: readonly Entity[]): EntitySet {
    const merged: Entity[] = [];
    const seen = new Set<string>();

    for (const entity of working) {
        // Duplicate working rows collapse onto the first one recorded
        if (seen.has(entity.id)) continue;
        seen.add(entity.id);
        merged.push(entity);
    }

    for (const entity of committed) {
        if (seen.has(entity.id)) continue;
        seen.add(entity.id);
        merged.push(Object.freeze({ ...entity, enrichmentSource: 'committed_ontology' as const }));
    }

    return partitionByType(merged);
}

/** Total number of entities across every type */
export function countEntities(set: EntitySet): number {
    let total = 0;
    for (const list of set.values()) total += list.length;
    return total;
}

/** Count per type; types with no entities are omitted */
export function countsByType(set: EntitySet): Partial<Record<EntityType, number>> {
    const counts: Partial<Record<EntityType, number>> = {};
    for (const [type, list] of set) {
        if (list.length > 0) counts[type] = list.length;
    }
    return counts;
}
