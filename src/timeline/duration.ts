/**
 * Coarse span wording, checked in order; the first unit found in any text wins.
 * Display only: nothing orders or segments by it.
 */
const DURATION_UNITS: ReadonlyArray<{ unit: string; description: string }> = [
    { unit: 'year', description: 'Spans several years' },
    { unit: 'month', description: 'Spans several months' },
    { unit: 'week', description: 'Spans several weeks' },
    { unit: 'day', description: 'Spans several days' },
];

export const NO_TIMELINE_DATA = 'No timeline data';
export const DURATION_UNSPECIFIED = 'Duration unspecified';

/**
 * Human-readable span summary from timepoint labels and temporal markers.
 */
export function estimateDuration(texts: readonly string[]): string {
    if (texts.length === 0) return NO_TIMELINE_DATA;

    const lowered = texts.map((text) => text.toLowerCase());
    for (const { unit, description } of DURATION_UNITS) {
        if (lowered.some((text) => text.includes(unit))) return description;
    }
    return DURATION_UNSPECIFIED;
}
