import { EntityType, ENTITY_TYPE_ORDER } from '../types/index.js';

const PLURALS: Partial<Record<EntityType, string>> = {
    [EntityType.CAPABILITY]: 'capabilities',
};

const LOOKUP = new Map<string, EntityType>();
for (const type of ENTITY_TYPE_ORDER) {
    const lower = type.toLowerCase();
    LOOKUP.set(lower, type);
    LOOKUP.set(PLURALS[type] ?? `${lower}s`, type);
}

/**
 * Map a stored type label onto the closed vocabulary.
 * Case-insensitive; accepts plural forms ("Roles", "actions", "Capabilities").
 * Returns null for anything else.
 */
export function normalizeEntityType(raw: string): EntityType | null {
    return LOOKUP.get(raw.trim().toLowerCase()) ?? null;
}
