import { PHASE_ORDER, type PhaseName, type TimelinePhase } from '../types/index.js';

export interface PhaseBoundaries {
    /** Exclusive end of the introduction */
    introEnd: number;
    /** Exclusive end of the development phase */
    devEnd: number;
}

const PHASE_DESCRIPTIONS: Readonly<Record<PhaseName, string>> = {
    introduction: 'Establishes the situation, the participants and their initial obligations',
    development: 'Events unfold and ethical tensions build toward the central decisions',
    resolution: 'Decisions are made and their consequences play out',
};

/**
 * Fixed-ratio split of N entries into introduction / development / resolution.
 *
 *   introEnd = max(1, floor(0.2N))
 *   devEnd   = max(introEnd + 1, floor(0.8N))
 *
 * Both are clamped to N, so N = 1 yields a lone introduction entry.
 */
export function computePhaseBoundaries(entryCount: number): PhaseBoundaries {
    const n = Math.max(0, Math.floor(entryCount));
    const introEnd = Math.min(n, Math.max(1, Math.floor(0.2 * n)));
    const devEnd = Math.min(n, Math.max(introEnd + 1, Math.floor(0.8 * n)));
    return { introEnd, devEnd };
}

/** Phase of the entry at `index` */
export function phaseOf(index: number, boundaries: PhaseBoundaries): PhaseName {
    if (index < boundaries.introEnd) return 'introduction';
    if (index < boundaries.devEnd) return 'development';
    return 'resolution';
}

/**
 * Describe the non-empty phases for N entries.
 */
export function segmentPhases(entryCount: number): Partial<Record<PhaseName, TimelinePhase>> {
    const boundaries = computePhaseBoundaries(entryCount);
    const ranges: Record<PhaseName, [number, number]> = {
        introduction: [0, boundaries.introEnd],
        development: [boundaries.introEnd, boundaries.devEnd],
        resolution: [boundaries.devEnd, Math.max(0, Math.floor(entryCount))],
    };

    const phases: Partial<Record<PhaseName, TimelinePhase>> = {};
    for (const name of PHASE_ORDER) {
        const [startIndex, endIndex] = ranges[name];
        if (endIndex <= startIndex) continue;
        phases[name] = {
            name,
            description: PHASE_DESCRIPTIONS[name],
            startIndex,
            endIndex,
            entryCount: endIndex - startIndex,
        };
    }
    return phases;
}
