import { Router } from 'express';
import { slidesController } from './controller';
import { asyncHandler } from '../../lib/asyncHandler';
import { authenticate } from '../../middleware/auth';
import { validate } from '../../middleware/validate';
import { formatSlidesSchema, generateSlidesSchema, narrationSchema } from './schema';

const router = Router();

// Format or edit existing slides
router.post(
    '/format/start',
    [authenticate, validate(formatSlidesSchema)],
    asyncHandler(slidesController.format)
);

// Generate a deck from a title and goal
router.post(
    '/generate/start',
    [authenticate, validate(generateSlidesSchema)],
    asyncHandler(slidesController.generate)
);

// Narration audio per slide
router.post(
    '/narration/start',
    [authenticate, validate(narrationSchema)],
    asyncHandler(slidesController.narrate)
);

export default router;
