import { Router } from 'express';
import { aiEditorController } from './controller';
import { asyncHandler } from '../../lib/asyncHandler';
import { authenticate } from '../../middleware/auth';
import { validate } from '../../middleware/validate';
import { aiEditorSchema } from './schema';

const router = Router();

// Edit, format or make bilingual one HTML document
router.post(
    '/start',
    [authenticate, validate(aiEditorSchema)],
    asyncHandler(aiEditorController.start)
);

export default router;
