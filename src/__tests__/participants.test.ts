import { describe, it, expect } from 'vitest';
import {
    buildCharacterArc,
    buildProfile,
    classifyNarrativeRole,
    deriveRoleType,
    findTimelineAppearances,
} from '../participants/profile-builder.js';
import { buildRelationshipGraph } from '../participants/relationship-graph.js';
import { FALLBACK_MOTIVATION, GOAL_RULES, matchAll } from '../participants/rules.js';
import { scoreProtagonist, selectProtagonist } from '../participants/scoring.js';
import { assembleTimeline } from '../timeline/timeline-constructor.js';
import { partitionByType } from '../collector/merge.js';
import { EntityType, type ParticipantProfile } from '../types/index.js';
import { makeEntity } from './helpers/entities.js';

function role(id: string, label: string, properties: Record<string, unknown> = {}, definition?: string) {
    return makeEntity(id, EntityType.ROLE, { label, properties, definition });
}

describe('rules', () => {
    it('should return every matching outcome once, in table order', () => {
        expect(matchAll(GOAL_RULES, 'Must report the deadline slip and disclose the safety issue')).toEqual([
            'Prevent harm to the public',
            'Deliver the project on schedule',
            'Communicate findings to the appropriate parties',
        ]);
    });

    it('should match keyword stems inside longer words', () => {
        expect(matchAll(GOAL_RULES, 'Disclosure was made')).toEqual(['Communicate findings to the appropriate parties']);
    });
});

describe('profile builder', () => {
    describe('deriveRoleType', () => {
        it('should split the last type segment into words', () => {
            expect(deriveRoleType(role('r', 'X', { typeHierarchy: 'urn:ethics#StructuralEngineerRole' }))).toBe('Structural Engineer Role');
            expect(deriveRoleType(role('r', 'X', { roleCategory: 'urn:ethics/roles/public_official' }))).toBe('public official');
            expect(deriveRoleType(role('r', 'X', { typeHierarchy: 'HVACDesignerRole' }))).toBe('HVAC Designer Role');
        });

        it('should fall back to the label', () => {
            expect(deriveRoleType(role('r', 'Engineer A'))).toBe('Engineer A');
            expect(deriveRoleType(role('r', 'Engineer A', { typeHierarchy: 'urn:ethics#' }))).toBe('Engineer A');
        });
    });

    describe('buildCharacterArc', () => {
        it('should chain matched phrases after the name', () => {
            expect(buildCharacterArc('Engineer A', 'Was hired, then identified a flaw and advised the owner'))
                .toBe('Engineer A takes on the engagement, then identifies a problem, then recommends a course of action.');
        });

        it('should fall back to the narrative, cut at 160 characters', () => {
            const long = 'x'.repeat(200);
            expect(buildCharacterArc('B', '  Watched quietly.  ')).toBe('Watched quietly.');
            expect(buildCharacterArc('B', long)).toBe(`${'x'.repeat(160)}...`);
            expect(buildCharacterArc('B', '')).toBe('');
        });
    });

    describe('classifyNarrativeRole', () => {
        it('should tag professionals with many obligations or any tension as protagonists', () => {
            expect(classifyNarrativeRole('Engineer Role', '', 3, 0)).toBe('protagonist');
            expect(classifyNarrativeRole('Professional', '', 0, 1)).toBe('protagonist');
            expect(classifyNarrativeRole('Engineer Role', '', 2, 0)).toBe('supporting');
        });

        it('should tag resisting stakeholders as antagonists', () => {
            expect(classifyNarrativeRole('Client Role', 'Refused to pay for repairs', 0, 0)).toBe('antagonist');
            expect(classifyNarrativeRole('Client Role', 'Paid promptly', 0, 0)).toBe('supporting');
            expect(classifyNarrativeRole('Neighbor', 'Objected loudly', 0, 0)).toBe('supporting');
        });

        it('should read objections, not objectives, as resistance', () => {
            expect(classifyNarrativeRole('Client Role', 'Objected to the repair schedule', 0, 0)).toBe('antagonist');
            expect(classifyNarrativeRole('Client Role', 'Raised an objection to the closure', 0, 0)).toBe('antagonist');
            expect(classifyNarrativeRole(
                'Client Role',
                'The client asked for an objective second opinion and agreed to every repair.',
                0,
                0
            )).toBe('supporting');
        });
    });

    describe('buildProfile', () => {
        it('should derive every field from the role entity', () => {
            const profile = buildProfile(role('case:1#A', 'Engineer A', {
                typeHierarchy: 'urn:x#ConsultingEngineerRole',
                caseInvolvement: 'Retained to check compliance with the standard; the owner refused to afford repairs.',
                obligations: ['Report hazards', 'Be honest'],
                activeObligations: ['Be honest', 'Stay competent'],
                constraints: 'Limited site access',
                specialization: 'Fire safety',
                license: 'PE',
                ethicalTensions: 'Loyalty vs. safety',
                relationships: [{ type: 'reports_to', target: 'case:1#B' }],
            }, '  Senior consultant  '));

            expect(profile).toEqual({
                id: 'case:1#A',
                sourceEntityUri: 'case:1#A',
                name: 'Engineer A',
                roleType: 'Consulting Engineer Role',
                background: 'Senior consultant',
                expertise: ['Fire safety'],
                qualifications: ['PE'],
                motivations: ['Uphold professional standards and regulatory compliance'],
                goals: ['Meet applicable codes and standards'],
                obligations: ['Report hazards', 'Be honest', 'Stay competent'],
                constraints: ['Limited site access', 'Financial pressure or hardship', 'Resistance or delay from other parties'],
                ethicalTensions: ['Loyalty vs. safety'],
                characterArc: 'Engineer A takes on the engagement, then meets resistance.',
                narrativeRole: 'protagonist',
                relationships: [{ targetId: 'case:1#B', kind: 'reports_to' }],
                timelineAppearances: [],
                enriched: false,
            });
        });

        it('should fall back on the generic motivation and experience', () => {
            const profile = buildProfile(role('r', 'Inspector', { experience: 'Ten years in the field' }));

            expect(profile.motivations).toEqual([FALLBACK_MOTIVATION]);
            expect(profile.background).toBe('Ten years in the field');
            expect(profile.goals).toEqual([]);
            expect(profile.characterArc).toBe('');
        });
    });

    describe('findTimelineAppearances', () => {
        const timeline = assembleTimeline(
            [{ label: 'T1', isInterval: false }, { label: 'T2', isInterval: false }, { label: 'T3', isInterval: false }],
            partitionByType([
                makeEntity('a1', EntityType.ACTION, { properties: { temporal_marker: 'T1', agent: 'case:1#A' } }),
                makeEntity('a2', EntityType.ACTION, { properties: { temporal_marker: 'T2', agent: 'someone else' } }),
                makeEntity('a3', EntityType.ACTION, { properties: { temporal_marker: 'T3', agent: 'ENGINEER A' } }),
            ])
        );

        it('should match agents by id or case-insensitive name', () => {
            expect(findTimelineAppearances('case:1#A', 'Engineer A', timeline)).toEqual([1, 3]);
        });

        it('should return nothing without a timeline', () => {
            expect(findTimelineAppearances('case:1#A', 'Engineer A', null)).toEqual([]);
        });
    });
});

describe('buildRelationshipGraph', () => {
    const rel = (sourceEntityUri: string, ...targets: string[]) => ({
        sourceEntityUri,
        relationships: targets.map((targetId) => ({ targetId, kind: 'related_to' })),
    });

    it('should make one-directional declarations symmetric', () => {
        expect(buildRelationshipGraph([rel('a', 'b'), rel('b'), rel('c', 'a')])).toEqual({
            a: ['b', 'c'],
            b: ['a'],
            c: ['a'],
        });
    });

    it('should collapse mutual declarations into one neighbor entry', () => {
        expect(buildRelationshipGraph([rel('a', 'b'), rel('b', 'a')])).toEqual({ a: ['b'], b: ['a'] });
    });

    it('should drop self references and keep isolated profiles', () => {
        expect(buildRelationshipGraph([rel('a', 'a'), rel('b')])).toEqual({ a: [], b: [] });
    });

    it('should add non-profile targets as nodes', () => {
        expect(buildRelationshipGraph([rel('a', 'z')])).toEqual({ a: ['z'], z: ['a'] });
    });
});

describe('protagonist scoring', () => {
    const profile = (id: string, overrides: Partial<ParticipantProfile> = {}): ParticipantProfile =>
        ({ ...buildProfile(role(id, overrides.name ?? id)), ...overrides });

    it('should weight tag, obligations, tensions and name', () => {
        expect(scoreProtagonist({
            name: 'Engineer B',
            narrativeRole: 'protagonist',
            obligations: ['o1', 'o2'],
            ethicalTensions: ['t1'],
        })).toBe(10 + 4 + 3 + 5);
        expect(scoreProtagonist({ name: 'Owner', narrativeRole: 'antagonist', obligations: [], ethicalTensions: [] })).toBe(0);
    });

    it('should pick the highest score and keep the rest in input order', () => {
        const selection = selectProtagonist([
            profile('owner', { name: 'Owner' }),
            profile('eng', { name: 'Engineer', obligations: ['a'] }),
            profile('tenant', { name: 'Tenant' }),
        ]);

        expect(selection.protagonist).toBe('eng');
        expect(selection.supportingCast).toEqual(['owner', 'tenant']);
        expect(selection.scores).toEqual({ owner: 0, eng: 7, tenant: 0 });
    });

    it('should break ties toward the earliest profile', () => {
        const selection = selectProtagonist([profile('x'), profile('y')]);
        expect(selection.protagonist).toBe('x');
    });

    it('should select nobody from an empty list', () => {
        expect(selectProtagonist([])).toEqual({ protagonist: null, supportingCast: [], scores: {} });
    });
});
