import type { EligibilityReport } from '../types/index.js';

/**
 * Error categories surfaced by the synthesis core.
 *
 *   NOT_FOUND    case does not exist (fatal, never retried)
 *   STORAGE      transient read failure (caller may retry with backoff)
 *   ELIGIBILITY  case exists but fails the completeness gate
 *   ENRICHMENT   narrative service failed (always recovered locally)
 *   UNEXPECTED   anything else; the only internal-fault signal
 */
export type ErrorCategory = 'NOT_FOUND' | 'STORAGE' | 'ELIGIBILITY' | 'ENRICHMENT' | 'UNEXPECTED';

const GENERIC_MESSAGES: Readonly<Record<ErrorCategory, string>> = {
    NOT_FOUND: 'The requested case does not exist.',
    STORAGE: 'The entity store is temporarily unavailable. Please retry.',
    ELIGIBILITY: 'The case is not eligible for scenario synthesis.',
    ENRICHMENT: 'Narrative enrichment is unavailable.',
    UNEXPECTED: 'Scenario synthesis failed due to an internal error.',
};

/**
 * Base class for all synthesis errors.
 */
export class ScenarioError extends Error {
    public readonly category: ErrorCategory;
    public readonly details?: Record<string, unknown>;

    constructor(category: ErrorCategory, message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'ScenarioError';
        this.category = category;
        this.details = options?.details;
    }

    /**
     * Message that can be shown to an end user without leaking internals.
     */
    toSafeMessage(): string {
        return GENERIC_MESSAGES[this.category];
    }

    /**
     * Convert to JSON for logging/serialization
     */
    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export class NotFoundError extends ScenarioError {
    constructor(public readonly caseId: string) {
        super('NOT_FOUND', `Case ${caseId} not found`, { details: { caseId } });
        this.name = 'NotFoundError';
    }

    override toSafeMessage(): string {
        return `Case ${this.caseId} does not exist.`;
    }
}

export class StorageError extends ScenarioError {
    public readonly retryable = true;

    constructor(message: string, cause?: unknown) {
        super('STORAGE', message, { cause });
        this.name = 'StorageError';
    }
}

/**
 * Raised when a case fails the completeness gate. Carries the full report so
 * the caller can explain which stages are missing.
 */
export class EligibilityError extends ScenarioError {
    constructor(public readonly report: EligibilityReport) {
        super('ELIGIBILITY', report.summary, { details: { missingStages: report.missingStages } });
        this.name = 'EligibilityError';
    }

    override toSafeMessage(): string {
        return `Case ${this.report.caseId} cannot be synthesized yet. Complete: ${this.report.missingStages.join(', ')}.`;
    }
}

export class EnrichmentError extends ScenarioError {
    constructor(message: string, cause?: unknown) {
        super('ENRICHMENT', message, { cause });
        this.name = 'EnrichmentError';
    }
}

/**
 * Any failure not covered by the categories above, tagged with the stage it came from.
 */
export class UnexpectedError extends ScenarioError {
    constructor(public readonly stage: string, cause: unknown) {
        super('UNEXPECTED', `Stage ${stage} failed: ${describeError(cause)}`, { cause, details: { stage } });
        this.name = 'UnexpectedError';
    }
}

/**
 * One-line description of an unknown thrown value.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
