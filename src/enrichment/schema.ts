import { z } from 'zod';

/**
 * Rewritten text for one profile, as returned by an enricher.
 */
export const EnrichedProfileTextSchema = z.object({
    id: z.string().min(1),
    background: z.string().optional(),
    characterArc: z.string().optional(),
});

export const EnrichmentOutputSchema = z.object({
    profiles: z.array(EnrichedProfileTextSchema),
    teachingNotes: z.array(z.string()).default([]),
});

/**
 * Subset of an OpenAI-compatible `/chat/completions` response.
 */
export const ChatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z.array(z.object({
        message: z.object({
            content: z.string().nullable(),
        }),
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number().default(0),
        completion_tokens: z.number().default(0),
        total_tokens: z.number().default(0),
    }).optional(),
});
