import { Request, Response } from 'express';
import { sendSuccess } from '../../lib/apiResponse';
import { ddl } from '../../lib/dd';
import { authContext } from '../../middleware/auth';
import { requestInput } from '../../middleware/validate';
import { getJobSchema, listJobsSchema } from './schema';
import { jobsService, pageMeta } from './service';

class JobsController {
    // poll one job
    async getJob(req: Request, res: Response) {
        ddl('route: GET /api/v1/jobs/:jobId');
        const userId = authContext(req).currentUser();
        const { params } = requestInput(getJobSchema, req);

        const snapshot = await jobsService.getJob(userId, params.jobId);
        return sendSuccess(req, res, snapshot, 200);
    }

    // job history, newest first
    async listJobs(req: Request, res: Response) {
        ddl('route: GET /api/v1/jobs');
        const userId = authContext(req).currentUser();
        const { query } = requestInput(listJobsSchema, req);

        const page = await jobsService.listJobs(userId, {
            limit: query.limit,
            skip: query.skip,
            queue: query.type,
        });
        return sendSuccess(req, res, page.jobs, 200, pageMeta(query, page.total));
    }

    async cancelJob(req: Request, res: Response) {
        ddl('route: DELETE /api/v1/jobs/:jobId/cancel');
        const userId = authContext(req).currentUser();
        const { params } = requestInput(getJobSchema, req);

        const cancel = await jobsService.cancelJob(userId, params.jobId);
        return sendSuccess(req, res, cancel, 200);
    }
}

export const jobsController = new JobsController();
