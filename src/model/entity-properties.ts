import type { PropertyValue, RelationshipDeclaration } from '../types/index.js';

/**
 * Well-known property keys and the aliases the extraction passes have used
 * for them over time. Lookups go through `normalizeKey`, so only spelling
 * variants that differ by more than case/punctuation need listing here.
 */
const KEY_ALIASES = {
    temporalMarker: ['temporalMarker', 'temporal'],
    involvement: ['caseInvolvement', 'involvement', 'involvementNarrative'],
    experience: ['experience'],
    specialization: ['specialization', 'expertise'],
    qualification: ['license', 'qualification', 'certification'],
    ethicalTensions: ['ethicalTensions', 'ethicalTension'],
    obligations: ['obligations', 'hasObligation'],
    activeObligations: ['activeObligations'],
    constraints: ['constraints', 'constraint'],
    agent: ['agent', 'performedBy'],
    typeHierarchy: ['typeHierarchy', 'roleCategory', 'parentType'],
    relationships: ['relationships', 'relationship'],
} as const satisfies Record<string, readonly string[]>;

const DEFAULT_RELATIONSHIP_TYPE = 'related_to';

/**
 * Normalize a property key: lowercase, drop everything but letters and digits.
 * `temporal_marker`, `temporalMarker` and `Temporal Marker` share one key.
 */
export function normalizeKey(key: string): string {
    return key.toLowerCase().replace(/[^a-z0-9]/g, '');
}

interface PropertyEntry {
    key: string;
    values: readonly PropertyValue[];
}

/**
 * Ordered key → values property bag with typed accessors for the keys the
 * synthesis stages rely on.
 */
export class EntityProperties {
    private readonly entries: ReadonlyMap<string, PropertyEntry>;

    constructor(entries: Iterable<readonly [string, readonly PropertyValue[]]> = []) {
        const map = new Map<string, PropertyEntry>();
        for (const [key, values] of entries) {
            const normalized = normalizeKey(key);
            if (!normalized) continue;
            const existing = map.get(normalized);
            map.set(normalized, {
                key: existing?.key ?? key,
                values: Object.freeze([...(existing?.values ?? []), ...values]),
            });
        }
        this.entries = map;
    }

    /**
     * Build from loosely-typed JSON (a stored `properties_json` column or a fixture file).
     * Scalars become strings, arrays are flattened one level, objects become flat string records.
     */
    static fromRecord(record: unknown): EntityProperties {
        if (!isPlainObject(record)) return new EntityProperties();

        const entries: Array<[string, PropertyValue[]]> = [];
        for (const [key, raw] of Object.entries(record)) {
            const values = (Array.isArray(raw) ? raw : [raw])
                .map(toPropertyValue)
                .filter((v): v is PropertyValue => v !== null);
            entries.push([key, values]);
        }
        return new EntityProperties(entries);
    }

    /** Original (first-seen) spelling of every key, in insertion order */
    keys(): string[] {
        return Array.from(this.entries.values(), (entry) => entry.key);
    }

    has(key: string): boolean {
        return (this.entries.get(normalizeKey(key))?.values.length ?? 0) > 0;
    }

    get(key: string): readonly PropertyValue[] {
        return this.entries.get(normalizeKey(key))?.values ?? [];
    }

    /** String values of a key, trimmed, empties dropped */
    getStrings(key: string): string[] {
        return this.get(key)
            .filter((v): v is string => typeof v === 'string')
            .map((v) => v.trim())
            .filter((v) => v.length > 0);
    }

    first(key: string): string | undefined {
        return this.getStrings(key)[0];
    }

    // ─── Well-known accessors ─────────────────────────────

    getTemporalMarker(): string | undefined {
        return this.firstOf(KEY_ALIASES.temporalMarker);
    }

    /** Free-text narrative of how the entity takes part in the case ('' when absent) */
    getInvolvementNarrative(): string {
        return this.firstOf(KEY_ALIASES.involvement) ?? '';
    }

    getExperience(): string | undefined {
        return this.firstOf(KEY_ALIASES.experience);
    }

    getSpecializations(): string[] {
        return this.allOf(KEY_ALIASES.specialization);
    }

    getQualifications(): string[] {
        return this.allOf(KEY_ALIASES.qualification);
    }

    getEthicalTensions(): string[] {
        return this.allOf(KEY_ALIASES.ethicalTensions);
    }

    getObligations(): string[] {
        return this.allOf(KEY_ALIASES.obligations);
    }

    getActiveObligations(): string[] {
        return this.allOf(KEY_ALIASES.activeObligations);
    }

    getConstraints(): string[] {
        return this.allOf(KEY_ALIASES.constraints);
    }

    getAgent(): string | undefined {
        return this.firstOf(KEY_ALIASES.agent);
    }

    /** Declared type hierarchy, most specific first */
    getTypeHierarchy(): string[] {
        return this.allOf(KEY_ALIASES.typeHierarchy);
    }

    getRelationships(): RelationshipDeclaration[] {
        const declarations: RelationshipDeclaration[] = [];
        for (const key of KEY_ALIASES.relationships) {
            for (const value of this.get(key)) {
                if (typeof value === 'string') {
                    const target = value.trim();
                    if (target) declarations.push({ type: DEFAULT_RELATIONSHIP_TYPE, target });
                    continue;
                }
                const target = value['target']?.trim();
                if (!target) continue;
                declarations.push({
                    type: value['type']?.trim() || DEFAULT_RELATIONSHIP_TYPE,
                    target,
                });
            }
        }
        return declarations;
    }

    toJSON(): Record<string, PropertyValue[]> {
        const out: Record<string, PropertyValue[]> = {};
        for (const entry of this.entries.values()) {
            out[entry.key] = [...entry.values];
        }
        return out;
    }

    private firstOf(keys: readonly string[]): string | undefined {
        for (const key of keys) {
            const value = this.first(key);
            if (value !== undefined) return value;
        }
        return undefined;
    }

    private allOf(keys: readonly string[]): string[] {
        return keys.flatMap((key) => this.getStrings(key));
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPropertyValue(raw: unknown): PropertyValue | null {
    if (typeof raw === 'string') return raw;
    if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
    if (isPlainObject(raw)) {
        const record: Record<string, string> = {};
        for (const [k, v] of Object.entries(raw)) {
            if (v === null || v === undefined) continue;
            record[k] = typeof v === 'string' ? v : JSON.stringify(v);
        }
        return Object.freeze(record);
    }
    return null;
}
