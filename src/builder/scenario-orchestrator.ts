import {
    DEFAULT_CONFIG,
    EntityType,
    STAGE_PROGRESS,
    type EntitySet,
    type EntityStore,
    type NarrativeEnricher,
    type PipelineStage,
    type ProgressCallback,
    type ProgressEvent,
    type ScenarioCoreResult,
    type StageSummary,
} from '../types/index.js';
import { DataCollector } from '../collector/data-collector.js';
import { countsByType } from '../collector/merge.js';
import { TimelineConstructor } from '../timeline/timeline-constructor.js';
import { ParticipantMapper } from '../participants/participant-mapper.js';
import { EligibilityError, ScenarioError, UnexpectedError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';

export interface ScenarioOrchestratorOptions {
    /** Narrative enricher handed to the participant mapper (no-op by default) */
    enricher?: NarrativeEnricher;
    /** Whole-run budget; 0 disables it */
    timeoutMs?: number;
    enrichmentTimeoutMs?: number;
}

/**
 * Emits progress events for one run. Percentages never go backwards, and
 * nothing is emitted once the run has failed.
 */
class ProgressTracker {
    stage: PipelineStage = 'eligibility_check';
    percent = 0;
    private closed = false;

    constructor(
        private readonly caseId: string,
        private readonly onProgress?: ProgressCallback
    ) { }

    report(stage: PipelineStage, percent: number, message: string, data?: Record<string, unknown>): void {
        if (this.closed) return;
        this.stage = stage;
        this.percent = Math.max(this.percent, percent);
        this.emit({ caseId: this.caseId, stage, percent: this.percent, message, data });
    }

    fail(error: ScenarioError): void {
        if (this.closed) return;
        this.emit({
            caseId: this.caseId,
            stage: 'error',
            percent: this.percent,
            message: error.message,
            data: { errorType: error.name, stage: this.stage },
        });
        this.closed = true;
    }

    private emit(event: ProgressEvent): void {
        if (!this.onProgress) return;
        try {
            const returned: unknown = this.onProgress(event);
            if (returned instanceof Promise) {
                void returned.catch((error: unknown) => {
                    getLogger().warn({ error, stage: event.stage }, 'Progress callback rejected');
                });
            }
        } catch (error) {
            getLogger().warn({ error, stage: event.stage }, 'Progress callback threw');
        }
    }
}

/**
 * Runs the synthesis stages in order:
 *
 * 1. Eligibility gate
 * 2. Dual-tier data collection
 * 3. Timeline construction
 * 4. Participant mapping (with optional enrichment)
 * 5. Extension-point stages (decisions, causality, norms, assembly, model, validation)
 */
export class ScenarioOrchestrator {
    private readonly collector: DataCollector;
    private readonly timelineConstructor: TimelineConstructor;
    private readonly mapper: ParticipantMapper;
    private readonly timeoutMs: number;

    constructor(store: EntityStore, options: ScenarioOrchestratorOptions = {}) {
        this.collector = new DataCollector(store);
        this.timelineConstructor = new TimelineConstructor(store);
        this.mapper = new ParticipantMapper({
            enricher: options.enricher,
            enrichmentTimeoutMs: options.enrichmentTimeoutMs,
        });
        this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.pipeline.timeoutMs;
    }

    /**
     * Produce the timeline and participant artifacts for a case.
     *
     * Rejects with `EligibilityError`, `NotFoundError` or `StorageError` as raised by
     * the stages, and with `UnexpectedError` (naming the stage) for anything else,
     * including the whole-run timeout.
     */
    async generate(caseId: string, onProgress?: ProgressCallback): Promise<ScenarioCoreResult> {
        const tracker = new ProgressTracker(caseId, onProgress);
        const startTime = Date.now();

        getLogger().info({ caseId, timeoutMs: this.timeoutMs }, 'Starting scenario generation');

        try {
            const result = await withTimeout(
                (signal) => this.run(caseId, tracker, startTime, signal),
                this.timeoutMs,
                `Scenario generation for case ${caseId}`
            );
            getLogger().info(
                { caseId, durationMs: result.durationMs, participants: result.participants.participants.length },
                'Scenario generation complete'
            );
            return result;
        } catch (error) {
            const failure = toPipelineError(error, tracker.stage);
            tracker.fail(failure);

            if (failure instanceof EligibilityError) {
                getLogger().warn({ caseId, missingStages: failure.report.missingStages }, 'Case not eligible for synthesis');
            } else {
                getLogger().error({ caseId, stage: tracker.stage, error: failure.toJSON() }, 'Scenario generation failed');
            }
            throw failure;
        }
    }

    private async run(
        caseId: string,
        tracker: ProgressTracker,
        startTime: number,
        signal: AbortSignal
    ): Promise<ScenarioCoreResult> {
        const enter = (stage: PipelineStage, message: string): void => {
            this.checkDeadline(caseId, startTime, signal);
            tracker.report(stage, STAGE_PROGRESS[stage][0], message);
        };
        const leave = (stage: PipelineStage, message: string, data?: Record<string, unknown>): void => {
            tracker.report(stage, STAGE_PROGRESS[stage][1], message, data);
        };

        // ──────────────────────────────────────────────────
        // Step 1: Eligibility
        // ──────────────────────────────────────────────────
        enter('eligibility_check', 'Checking case eligibility');
        const eligibility = this.collector.checkEligibility(caseId);
        if (!eligibility.eligible) {
            throw new EligibilityError(eligibility);
        }
        leave('eligibility_check', eligibility.summary);

        // ──────────────────────────────────────────────────
        // Step 2: Data collection
        // ──────────────────────────────────────────────────
        enter('data_collection', 'Loading working and committed entities');
        const data = this.collector.collectAllData(caseId);
        leave('data_collection', `Merged ${data.counts.merged} entities`, { ...data.counts });

        // ──────────────────────────────────────────────────
        // Step 3: Timeline
        // ──────────────────────────────────────────────────
        enter('timeline_construction', 'Building timeline');
        const timeline = this.timelineConstructor.buildTimeline(caseId, data.merged);
        leave('timeline_construction', `Timeline has ${timeline.entries.length} entries`, {
            entries: timeline.entries.length,
            actions: timeline.totalActions,
            events: timeline.totalEvents,
        });

        // ──────────────────────────────────────────────────
        // Step 4: Participants
        // ──────────────────────────────────────────────────
        enter('participant_mapping', 'Mapping participants');
        const participants = await this.mapper.mapParticipants(
            data.merged.get(EntityType.ROLE) ?? [],
            timeline,
            { caseId, signal }
        );
        leave('participant_mapping', `Mapped ${participants.participants.length} participants`, {
            participants: participants.participants.length,
            protagonist: participants.protagonist,
        });

        // ──────────────────────────────────────────────────
        // Step 5: Extension points
        // ──────────────────────────────────────────────────
        const summaries = extensionStageCounts(data.merged, {
            timelineEntries: timeline.entries.length,
            unplaced: timeline.unplaced.length,
            participants: participants.participants.length,
            enriched: participants.participants.filter((p) => p.enriched).length,
        });

        const stages: StageSummary[] = [];
        for (const summary of summaries) {
            enter(summary.stage, `Running ${summary.stage.replace(/_/g, ' ')}`);
            stages.push(summary);
            leave(summary.stage, `Finished ${summary.stage.replace(/_/g, ' ')}`, { ...summary.counts });
        }

        this.checkDeadline(caseId, startTime, signal);
        tracker.report('complete', STAGE_PROGRESS.complete[1], 'Scenario core generated');

        return Object.freeze({
            caseId,
            title: data.metadata.title,
            eligibility,
            mergedEntityCounts: countsByType(data.merged),
            timeline,
            participants,
            stages: Object.freeze(stages),
            durationMs: Date.now() - startTime,
        });
    }

    /**
     * Stages are synchronous between awaits, so the budget is also checked at every boundary.
     */
    private checkDeadline(caseId: string, startTime: number, signal: AbortSignal): void {
        if (signal.aborted || (this.timeoutMs > 0 && Date.now() - startTime > this.timeoutMs)) {
            throw new TimeoutError(`Scenario generation for case ${caseId}`, this.timeoutMs);
        }
    }
}

/**
 * Count summaries for the stages that only report progress.
 */
function extensionStageCounts(
    merged: EntitySet,
    built: { timelineEntries: number; unplaced: number; participants: number; enriched: number }
): StageSummary[] {
    const count = (type: EntityType): number => merged.get(type)?.length ?? 0;
    const causalLinks = [...(merged.get(EntityType.ACTION) ?? []), ...(merged.get(EntityType.EVENT) ?? [])]
        .filter((entity) => entity.properties.has('causes') || entity.properties.has('causedBy'))
        .length;

    return [
        { stage: 'decision_identification', counts: { actions: count(EntityType.ACTION), questions: count(EntityType.QUESTION) } },
        { stage: 'causal_integration', counts: { causalLinks } },
        { stage: 'normative_integration', counts: { principles: count(EntityType.PRINCIPLE), obligations: count(EntityType.OBLIGATION) } },
        { stage: 'scenario_assembly', counts: { timelineEntries: built.timelineEntries, participants: built.participants } },
        { stage: 'model_generation', counts: { conclusions: count(EntityType.CONCLUSION) } },
        { stage: 'validation', counts: { unplacedElements: built.unplaced, enrichedProfiles: built.enriched } },
    ];
}

/**
 * Synthesis errors pass through; everything else is tagged with the stage it came from.
 */
function toPipelineError(error: unknown, stage: PipelineStage): ScenarioError {
    if (error instanceof ScenarioError) return error;
    return new UnexpectedError(stage, error);
}

/**
 * One-shot entry point: build an orchestrator over `store` and run it.
 */
export function generateScenarioCore(
    caseId: string,
    onProgress: ProgressCallback | undefined,
    deps: { store: EntityStore } & ScenarioOrchestratorOptions
): Promise<ScenarioCoreResult> {
    const { store, ...options } = deps;
    return new ScenarioOrchestrator(store, options).generate(caseId, onProgress);
}
