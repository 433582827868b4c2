import type { ParticipantProfile } from '../types/index.js';

/**
 * Protagonist scoring weights.
 */
export interface ProtagonistWeights {
    protagonistTag: number;
    perObligation: number;
    perTension: number;
    engineerName: number;
}

const DEFAULT_WEIGHTS: ProtagonistWeights = {
    protagonistTag: 10,
    perObligation: 2,
    perTension: 3,
    engineerName: 5,
};

/**
 * score = 10·[tagged protagonist] + 2·obligations + 3·tensions + 5·["engineer" in name]
 */
export function scoreProtagonist(
    profile: Pick<ParticipantProfile, 'name' | 'narrativeRole' | 'obligations' | 'ethicalTensions'>,
    weights: ProtagonistWeights = DEFAULT_WEIGHTS
): number {
    return (profile.narrativeRole === 'protagonist' ? weights.protagonistTag : 0)
        + weights.perObligation * profile.obligations.length
        + weights.perTension * profile.ethicalTensions.length
        + (profile.name.toLowerCase().includes('engineer') ? weights.engineerName : 0);
}

export interface ProtagonistSelection {
    protagonist: string | null;
    supportingCast: string[];
    scores: Record<string, number>;
}

/**
 * Highest score wins; ties go to the earliest profile. Empty input selects nobody.
 */
export function selectProtagonist(
    profiles: readonly ParticipantProfile[],
    weights: ProtagonistWeights = DEFAULT_WEIGHTS
): ProtagonistSelection {
    const scores: Record<string, number> = {};
    let best: { id: string; score: number } | null = null;

    for (const profile of profiles) {
        const score = scoreProtagonist(profile, weights);
        scores[profile.id] = score;
        // Strict comparison keeps the first-seen profile on ties
        if (best === null || score > best.score) {
            best = { id: profile.id, score };
        }
    }

    const protagonist = best?.id ?? null;
    return {
        protagonist,
        supportingCast: profiles.map((p) => p.id).filter((id) => id !== protagonist),
        scores,
    };
}
