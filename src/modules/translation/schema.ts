import { z } from 'zod';
import { jobIdParams, paginationQuery } from '../jobs/schema';

const bookIdParams = z.object({
    bookId: z.string().min(1, 'Book id is required'),
});

export const startTranslationSchema = z.object({
    params: bookIdParams,
    body: z.object({
        target_language: z.string().min(2, 'Target language is required'),
        source_language: z.string().min(2).optional(),
    }),
});

export const translationJobSchema = z.object({
    params: bookIdParams.extend(jobIdParams.shape),
});

export const listTranslationJobsSchema = z.object({
    params: bookIdParams,
    query: paginationQuery,
});

export type StartTranslationInput = z.infer<typeof startTranslationSchema>['body'];
