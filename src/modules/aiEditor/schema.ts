import { z } from 'zod';

export const aiEditorSchema = z.object({
    body: z
        .object({
            document_id: z.string().min(1, 'Document id is required'),
            operation: z.enum(['edit', 'format', 'bilingual']),
            content_type: z.enum(['document', 'chapter', 'slide']).default('document'),
            content: z.string().min(1, 'Content is required'),
            instruction: z.string().trim().min(1).nullable().default(null),
            source_language: z.string().min(2).nullable().default(null),
            target_language: z.string().min(2).nullable().default(null),
            bilingual_style: z
                .enum(['slash_separated', 'line_break'])
                .nullable()
                .default(null),
        })
        .refine((body) => body.operation !== 'edit' || body.instruction !== null, {
            message: 'An instruction is required for edit',
            path: ['instruction'],
        })
        .refine((body) => body.operation !== 'bilingual' || body.target_language !== null, {
            message: 'A target language is required for bilingual',
            path: ['target_language'],
        }),
});

export type AiEditorInput = z.infer<typeof aiEditorSchema>['body'];
