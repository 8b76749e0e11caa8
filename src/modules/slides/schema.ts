import { z } from 'zod';

export const formatSlidesSchema = z.object({
    body: z.object({
        document_id: z.string().min(1).nullable().default(null),
        format_type: z.enum(['format', 'edit']).default('format'),
        instruction: z.string().trim().min(1).nullable().default(null),
        slides: z
            .array(
                z.object({
                    index: z.number().int().nonnegative().optional(),
                    html: z.string().min(1, 'Slide HTML is required'),
                })
            )
            .min(1, 'At least one slide is required')
            .max(100),
    }),
});

export const generateSlidesSchema = z.object({
    body: z
        .object({
            title: z.string().trim().min(1, 'Title is required'),
            goal: z.string().default(''),
            slide_type: z.enum(['academy', 'business']).default('academy'),
            language: z.string().min(2).default('vi'),
            min_slides: z.number().int().min(1).max(50).default(5),
            max_slides: z.number().int().min(1).max(50).default(10),
            user_query: z.string().trim().min(1).nullable().default(null),
        })
        .refine((body) => body.min_slides <= body.max_slides, {
            message: 'min_slides must not exceed max_slides',
            path: ['min_slides'],
        }),
});

export const narrationSchema = z.object({
    body: z.object({
        presentation_id: z.string().min(1, 'Presentation id is required'),
        language: z.string().min(2).default('vi'),
        voice: z
            .object({
                name: z.string().min(1).default('Despina'),
                speaking_rate: z.number().min(0.25).max(4).default(1),
            })
            .default({ name: 'Despina', speaking_rate: 1 }),
        slides: z
            .array(
                z.object({
                    index: z.number().int().nonnegative(),
                    script: z.string(),
                })
            )
            .min(1, 'At least one slide is required'),
    }),
});

export type FormatSlidesInput = z.infer<typeof formatSlidesSchema>['body'];
export type GenerateSlidesInput = z.infer<typeof generateSlidesSchema>['body'];
export type NarrationInput = z.infer<typeof narrationSchema>['body'];
