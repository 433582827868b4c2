import type { EnrichmentOutput, NarrativeEnricher } from '../types/index.js';

/**
 * Default enricher: leaves every profile as built.
 */
export class NoopNarrativeEnricher implements NarrativeEnricher {
    readonly name = 'noop';

    async enhance(): Promise<EnrichmentOutput> {
        return { profiles: [], teachingNotes: [] };
    }
}
