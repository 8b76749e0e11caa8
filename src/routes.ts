import { Router } from 'express';
// Route imports
import jobRoutes from './modules/jobs/route';
import translationRoutes from './modules/translation/route';
import slideRoutes from './modules/slides/route';
import aiEditorRoutes from './modules/aiEditor/route';

const router = Router();

router.use('/jobs', jobRoutes);
router.use('/books', translationRoutes);
router.use('/slides', slideRoutes);
router.use('/ai-editor', aiEditorRoutes);

export default router;
