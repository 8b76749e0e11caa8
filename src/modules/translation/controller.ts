import { Request, Response } from 'express';
import { sendSuccess } from '../../lib/apiResponse';
import { ddl } from '../../lib/dd';
import { authContext } from '../../middleware/auth';
import { requestInput } from '../../middleware/validate';
import { pageMeta } from '../jobs/service';
import {
    listTranslationJobsSchema,
    startTranslationSchema,
    translationJobSchema,
} from './schema';
import { translationService } from './service';

class TranslationController {
    async start(req: Request, res: Response) {
        ddl('route: POST /api/v1/books/:bookId/translate/start');
        const userId = authContext(req).currentUser();
        const { params, body } = requestInput(startTranslationSchema, req);
        ddl('body ->', body);

        const snapshot = await translationService.start(userId, params.bookId, body);
        return sendSuccess(req, res, snapshot, 200);
    }

    async status(req: Request, res: Response) {
        const userId = authContext(req).currentUser();
        const { params } = requestInput(translationJobSchema, req);

        const snapshot = await translationService.status(userId, params.bookId, params.jobId);
        return sendSuccess(req, res, snapshot, 200);
    }

    async cancel(req: Request, res: Response) {
        ddl('route: DELETE /api/v1/books/:bookId/translate/cancel/:jobId');
        const userId = authContext(req).currentUser();
        const { params } = requestInput(translationJobSchema, req);

        const cancel = await translationService.cancel(userId, params.bookId, params.jobId);
        return sendSuccess(req, res, cancel, 200);
    }

    async listJobs(req: Request, res: Response) {
        const userId = authContext(req).currentUser();
        const { params, query } = requestInput(listTranslationJobsSchema, req);

        const page = await translationService.list(userId, params.bookId, query);
        return sendSuccess(req, res, page.jobs, 200, pageMeta(query, page.total));
    }
}

export const translationController = new TranslationController();
