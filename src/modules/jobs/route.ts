import { Router } from 'express';
import { jobsController } from './controller';
import { asyncHandler } from '../../lib/asyncHandler';
import { authenticate } from '../../middleware/auth';
import { validate } from '../../middleware/validate';
import { getJobSchema, listJobsSchema } from './schema';

const router = Router();

// list of the caller's jobs
router.get(
    '/',
    [authenticate, validate(listJobsSchema)],
    asyncHandler(jobsController.listJobs)
);

// job status
router.get(
    '/:jobId',
    [authenticate, validate(getJobSchema)],
    asyncHandler(jobsController.getJob)
);

// cancel a job
router.delete(
    '/:jobId/cancel',
    [authenticate, validate(getJobSchema)],
    asyncHandler(jobsController.cancelJob)
);

export default router;
