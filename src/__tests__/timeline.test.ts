import { describe, it, expect } from 'vitest';
import { partitionByType } from '../collector/merge.js';
import { estimateDuration } from '../timeline/duration.js';
import { computePhaseBoundaries, phaseOf, segmentPhases } from '../timeline/phases.js';
import { TimelineConstructor, assembleTimeline } from '../timeline/timeline-constructor.js';
import { EntityType, type Timepoint } from '../types/index.js';
import { makeEntity } from './helpers/entities.js';
import { FakeEntityStore } from './helpers/fake-store.js';

function timepoints(...labels: string[]): Timepoint[] {
    return labels.map((label) => ({ label, isInterval: false }));
}

describe('Timeline phases', () => {
    const sizes = (n: number) => {
        const phases = segmentPhases(n);
        return [phases.introduction?.entryCount ?? 0, phases.development?.entryCount ?? 0, phases.resolution?.entryCount ?? 0];
    };

    it('should produce no phases for an empty timeline', () => {
        expect(segmentPhases(0)).toEqual({});
    });

    it('should put a single entry in the introduction', () => {
        expect(sizes(1)).toEqual([1, 0, 0]);
        expect(Object.keys(segmentPhases(1))).toEqual(['introduction']);
    });

    it('should leave the resolution empty for two entries', () => {
        expect(sizes(2)).toEqual([1, 1, 0]);
    });

    it('should split larger timelines by the fixed ratios', () => {
        expect(sizes(3)).toEqual([1, 1, 1]);
        expect(sizes(5)).toEqual([1, 3, 1]);
        expect(sizes(8)).toEqual([1, 5, 2]);
        expect(sizes(10)).toEqual([2, 6, 2]);
    });

    it('should cover every entry exactly once', () => {
        for (let n = 1; n <= 25; n++) {
            const total = sizes(n).reduce((a, b) => a + b, 0);
            expect(total).toBe(n);
        }
    });

    it('should expose contiguous index ranges', () => {
        const phases = segmentPhases(10);
        expect(phases.introduction).toMatchObject({ startIndex: 0, endIndex: 2 });
        expect(phases.development).toMatchObject({ startIndex: 2, endIndex: 8 });
        expect(phases.resolution).toMatchObject({ startIndex: 8, endIndex: 10 });
    });

    it('should map indices onto phases', () => {
        const boundaries = computePhaseBoundaries(10);
        expect([0, 1, 2, 7, 8, 9].map((i) => phaseOf(i, boundaries))).toEqual([
            'introduction', 'introduction', 'development', 'development', 'resolution', 'resolution',
        ]);
    });
});

describe('estimateDuration', () => {
    it('should prefer the longest unit present', () => {
        expect(estimateDuration(['Day 1', 'Two months later'])).toBe('Spans several months');
        expect(estimateDuration(['First year', 'Week 3'])).toBe('Spans several years');
    });

    it('should match case-insensitively', () => {
        expect(estimateDuration(['WEEK ONE'])).toBe('Spans several weeks');
        expect(estimateDuration(['Monday'])).toBe('Spans several days');
    });

    it('should report unspecified and empty inputs distinctly', () => {
        expect(estimateDuration(['Initial engagement'])).toBe('Duration unspecified');
        expect(estimateDuration([])).toBe('No timeline data');
    });
});

describe('assembleTimeline', () => {
    const entities = partitionByType([
        makeEntity('a2', EntityType.ACTION, { label: 'Write report', properties: { temporal_marker: 'Day 2', agent: 'Engineer A' } }),
        makeEntity('a1', EntityType.ACTION, { label: 'Inspect', properties: { temporalMarker: 'Day 1' } }),
        makeEntity('e1', EntityType.EVENT, { label: 'Crack found', properties: { temporal_marker: 'Day 1', agent: 'nobody' } }),
        makeEntity('e2', EntityType.EVENT, { label: 'Storm', properties: { temporal_marker: 'Sometime' } }),
        makeEntity('e3', EntityType.EVENT, { label: 'No marker' }),
        makeEntity('r1', EntityType.ROLE, { label: 'Engineer A', properties: { temporal_marker: 'Day 1' } }),
    ]);

    it('should number entries from 1 in input order', () => {
        const timeline = assembleTimeline(timepoints('Day 2', 'Day 1'), entities);
        expect(timeline.entries.map((e) => [e.sequence, e.label])).toEqual([[1, 'Day 2'], [2, 'Day 1']]);
    });

    it('should attach actions before events and only action agents', () => {
        const timeline = assembleTimeline(timepoints('Day 1', 'Day 2'), entities);

        expect(timeline.entries[0]?.elements).toEqual([
            { id: 'a1', label: 'Inspect', type: EntityType.ACTION, agent: null },
            { id: 'e1', label: 'Crack found', type: EntityType.EVENT, agent: null },
        ]);
        expect(timeline.entries[1]?.elements).toEqual([
            { id: 'a2', label: 'Write report', type: EntityType.ACTION, agent: 'Engineer A' },
        ]);
    });

    it('should report entities whose marker matches no timepoint', () => {
        const timeline = assembleTimeline(timepoints('Day 1', 'Day 2'), entities);

        expect(timeline.unplaced).toEqual(['e2']);
        expect(timeline.totalActions).toBe(2);
        expect(timeline.totalEvents).toBe(1);
    });

    it('should not match markers loosely', () => {
        const timeline = assembleTimeline(timepoints('day 1'), entities);
        expect(timeline.entries[0]?.elements).toEqual([]);
        expect(timeline.totalActions).toBe(0);
    });

    it('should ignore surrounding whitespace on both markers and labels', () => {
        const padded = partitionByType([
            makeEntity('a1', EntityType.ACTION, { label: 'Inspect', properties: { temporal_marker: '  Day 1 ' } }),
            makeEntity('a2', EntityType.ACTION, { label: 'Report', properties: { temporal_marker: 'Day 2' } }),
        ]);

        const timeline = assembleTimeline(timepoints('Day 1', ' Day 2  '), padded);

        expect(timeline.entries.map((e) => e.elements.map((el) => el.id))).toEqual([['a1'], ['a2']]);
        expect(timeline.entries[1]?.label).toBe(' Day 2  ');
        expect(timeline.unplaced).toEqual([]);
    });

    it('should derive the duration from labels and markers', () => {
        expect(assembleTimeline(timepoints('Start', 'End'), entities).durationDescription).toBe('Spans several days');
    });

    it('should return an empty timeline when there are no timepoints', () => {
        const timeline = assembleTimeline([], entities);

        expect(timeline.entries).toEqual([]);
        expect(timeline.phases).toEqual({});
        expect(timeline.durationDescription).toBe('No timeline data');
        expect(timeline.unplaced).toEqual(['a1', 'e1', 'a2', 'e2']);
    });

    it('should carry interval flags, durations and the consistency record through', () => {
        const timeline = assembleTimeline(
            [{ label: 'Week 1', isInterval: true, duration: 'P1W' }],
            new Map(),
            { consistent: true }
        );

        expect(timeline.entries[0]).toMatchObject({ isInterval: true, duration: 'P1W', phase: 'introduction' });
        expect(timeline.temporalConsistency).toEqual({ consistent: true });
    });

    it('should freeze the result', () => {
        const timeline = assembleTimeline(timepoints('Day 1'), entities);
        expect(Object.isFrozen(timeline)).toBe(true);
        expect(Object.isFrozen(timeline.entries[0])).toBe(true);
    });
});

describe('TimelineConstructor', () => {
    it('should merge both tiers from the store when no set is given', () => {
        const store = new FakeEntityStore({
            'case-1': {
                working: [makeEntity('a1', EntityType.ACTION, { properties: { temporal_marker: 'Day 1' } })],
                committed: [makeEntity('e1', EntityType.EVENT, { properties: { temporal_marker: 'Day 1' }, source: 'committed' })],
                timepoints: timepoints('Day 1'),
                temporalConsistency: { checked: 1 },
            },
        });

        const timeline = new TimelineConstructor(store).buildTimeline('case-1');

        expect(timeline.entries[0]?.elements.map((e) => e.id)).toEqual(['a1', 'e1']);
        expect(timeline.temporalConsistency).toEqual({ checked: 1 });
    });

    it('should use the supplied merged set without reading entities', () => {
        const store = new FakeEntityStore({ 'case-1': { timepoints: timepoints('Day 1') } });
        const merged = partitionByType([makeEntity('a1', EntityType.ACTION, { properties: { temporal_marker: 'Day 1' } })]);

        const timeline = new TimelineConstructor(store).buildTimeline('case-1', merged);

        expect(timeline.totalActions).toBe(1);
        expect(store.calls).not.toContain('readWorkingEntities');
    });
});
