import { z } from 'zod';
import { QUEUE_NAMES } from '../../types/job';

export const jobIdParams = z.object({
    jobId: z.string().min(1, 'Job id is required'),
});

export const paginationQuery = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(20),
    skip: z.coerce.number().int().min(0).default(0),
});

export const getJobSchema = z.object({
    params: jobIdParams,
});

export const listJobsSchema = z.object({
    query: paginationQuery.extend({
        type: z.enum(QUEUE_NAMES).optional(),
    }),
});

export type ListJobsQuery = z.infer<typeof listJobsSchema>['query'];
