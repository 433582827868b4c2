import type { Entity, NarrativeRole, ParticipantProfile, ScenarioTimeline } from '../types/index.js';
import {
    ARC_RULES,
    CONSTRAINT_RULES,
    FALLBACK_MOTIVATION,
    GOAL_RULES,
    MOTIVATION_RULES,
    PROFESSIONAL_ROLE_MARKERS,
    RESISTANCE_MARKERS,
    STAKEHOLDER_ROLE_MARKERS,
    matchAll,
    matchesAny,
} from './rules.js';

const ARC_FALLBACK_LENGTH = 160;

/**
 * Role type from the most specific declared type: the segment after the last
 * `#` or `/`, split into words ("StructuralEngineer" → "Structural Engineer").
 * Falls back to the label.
 */
export function deriveRoleType(entity: Entity): string {
    const declared = entity.properties.getTypeHierarchy()[0];
    if (!declared) return entity.label;

    const segment = declared.split(/[#/]/).pop()?.trim() ?? '';
    const words = segment
        .replace(/[_-]+/g, ' ')
        .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
        .replace(/\s+/g, ' ')
        .trim();
    return words || entity.label;
}

/**
 * "<name> <phrase>, then <phrase>." from matched arc phrases; otherwise the
 * narrative itself, cut at 160 characters.
 */
export function buildCharacterArc(name: string, narrative: string): string {
    const phrases = matchAll(ARC_RULES, narrative);
    if (phrases.length > 0) {
        return `${name} ${phrases.join(', then ')}.`;
    }

    const trimmed = narrative.trim();
    if (trimmed.length <= ARC_FALLBACK_LENGTH) return trimmed;
    return `${trimmed.slice(0, ARC_FALLBACK_LENGTH)}...`;
}

export function classifyNarrativeRole(
    roleType: string,
    narrative: string,
    obligationCount: number,
    tensionCount: number
): NarrativeRole {
    if (matchesAny(PROFESSIONAL_ROLE_MARKERS, roleType)) {
        return obligationCount > 2 || tensionCount > 0 ? 'protagonist' : 'supporting';
    }
    if (matchesAny(STAKEHOLDER_ROLE_MARKERS, roleType) && matchesAny(RESISTANCE_MARKERS, narrative)) {
        return 'antagonist';
    }
    return 'supporting';
}

/**
 * Sequence numbers of timeline entries with an element whose agent names this participant.
 */
export function findTimelineAppearances(
    id: string,
    name: string,
    timeline: ScenarioTimeline | null | undefined
): number[] {
    if (!timeline) return [];

    const lowerName = name.toLowerCase();
    return timeline.entries
        .filter((entry) =>
            entry.elements.some((element) =>
                element.agent !== null && (element.agent === id || element.agent.toLowerCase() === lowerName)
            )
        )
        .map((entry) => entry.sequence);
}

/**
 * Derive one participant profile from a Role entity.
 */
export function buildProfile(entity: Entity, timeline?: ScenarioTimeline | null): ParticipantProfile {
    const props = entity.properties;
    const narrative = props.getInvolvementNarrative();
    const roleType = deriveRoleType(entity);

    const motivations = matchAll(MOTIVATION_RULES, narrative);
    const obligations = unique([...props.getObligations(), ...props.getActiveObligations()]);
    const ethicalTensions = props.getEthicalTensions();

    return {
        id: entity.id,
        sourceEntityUri: entity.id,
        name: entity.label,
        roleType,
        background: entity.definition?.trim() || props.getExperience() || '',
        expertise: props.getSpecializations(),
        qualifications: props.getQualifications(),
        motivations: motivations.length > 0 ? motivations : [FALLBACK_MOTIVATION],
        goals: matchAll(GOAL_RULES, narrative),
        obligations,
        constraints: unique([...props.getConstraints(), ...matchAll(CONSTRAINT_RULES, narrative)]),
        ethicalTensions,
        characterArc: buildCharacterArc(entity.label, narrative),
        narrativeRole: classifyNarrativeRole(roleType, narrative, obligations.length, ethicalTensions.length),
        relationships: props.getRelationships().map((rel) => ({ targetId: rel.target, kind: rel.type })),
        timelineAppearances: findTimelineAppearances(entity.id, entity.label, timeline),
        enriched: false,
    };
}

function unique(values: readonly string[]): string[] {
    return [...new Set(values)];
}
