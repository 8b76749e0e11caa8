import { Router } from 'express';
import { translationController } from './controller';
import { asyncHandler } from '../../lib/asyncHandler';
import { authenticate } from '../../middleware/auth';
import { validate } from '../../middleware/validate';
import {
    listTranslationJobsSchema,
    startTranslationSchema,
    translationJobSchema,
} from './schema';

const router = Router();

// Start a background translation of the whole book
router.post(
    '/:bookId/translate/start',
    [authenticate, validate(startTranslationSchema)],
    asyncHandler(translationController.start)
);

router.get(
    '/:bookId/translate/status/:jobId',
    [authenticate, validate(translationJobSchema)],
    asyncHandler(translationController.status)
);

router.delete(
    '/:bookId/translate/cancel/:jobId',
    [authenticate, validate(translationJobSchema)],
    asyncHandler(translationController.cancel)
);

// translation history of one book
router.get(
    '/:bookId/translate/jobs',
    [authenticate, validate(listTranslationJobsSchema)],
    asyncHandler(translationController.listJobs)
);

export default router;
