// lib/queue/schema.ts
import { z } from 'zod';
import type { JsonValue } from '../../types/job';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(z.string(), jsonValueSchema),
    ])
);

export const jsonObjectSchema = z.record(z.string(), jsonValueSchema);

const envelope = {
    taskId: z.string().min(1),
    jobId: z.string().min(1),
    userId: z.string().min(1),
    enqueuedAt: z.string(),
};

export const translationPayloadSchema = z.object({
    bookId: z.string().min(1),
    targetLanguage: z.string().min(2),
    sourceLanguage: z.string().min(2),
});

export const slideFormatPayloadSchema = z.object({
    documentId: z.string().nullable(),
    formatType: z.enum(['format', 'edit']),
    instruction: z.string().nullable(),
    slides: z
        .array(
            z.object({
                index: z.number().int().nonnegative(),
                html: z.string(),
            })
        )
        .min(1),
});

export const slideGenerationPayloadSchema = z.object({
    title: z.string().min(1),
    goal: z.string(),
    slideType: z.enum(['academy', 'business']),
    language: z.string().min(2),
    minSlides: z.number().int().positive(),
    maxSlides: z.number().int().positive(),
    userQuery: z.string().nullable(),
});

export const narrationAudioPayloadSchema = z.object({
    presentationId: z.string().min(1),
    language: z.string().min(2),
    voice: z.object({
        name: z.string().min(1),
        speakingRate: z.number().positive(),
    }),
    slides: z
        .array(
            z.object({
                index: z.number().int().nonnegative(),
                script: z.string().min(1),
            })
        )
        .min(1),
});

export const aiEditorPayloadSchema = z.object({
    documentId: z.string().min(1),
    operation: z.enum(['edit', 'format', 'bilingual']),
    contentType: z.enum(['document', 'chapter', 'slide']),
    content: z.string().min(1),
    instruction: z.string().nullable(),
    sourceLanguage: z.string().nullable(),
    targetLanguage: z.string().nullable(),
    bilingualStyle: z.enum(['slash_separated', 'line_break']).nullable(),
});

export const taskSchema = z.discriminatedUnion('queue', [
    z.object({
        ...envelope,
        queue: z.literal('translation'),
        payload: translationPayloadSchema,
    }),
    z.object({
        ...envelope,
        queue: z.literal('slide-format'),
        payload: slideFormatPayloadSchema,
    }),
    z.object({
        ...envelope,
        queue: z.literal('slide-generation'),
        payload: slideGenerationPayloadSchema,
    }),
    z.object({
        ...envelope,
        queue: z.literal('narration-audio'),
        payload: narrationAudioPayloadSchema,
    }),
    z.object({
        ...envelope,
        queue: z.literal('ai-editor'),
        payload: aiEditorPayloadSchema,
    }),
]);
