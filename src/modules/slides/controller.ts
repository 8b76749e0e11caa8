import { Request, Response } from 'express';
import { sendSuccess } from '../../lib/apiResponse';
import { ddl } from '../../lib/dd';
import { authContext } from '../../middleware/auth';
import { requestInput } from '../../middleware/validate';
import { formatSlidesSchema, generateSlidesSchema, narrationSchema } from './schema';
import { slidesService } from './service';

class SlidesController {
    async format(req: Request, res: Response) {
        ddl('route: POST /api/v1/slides/format/start');
        const userId = authContext(req).currentUser();
        const { body } = requestInput(formatSlidesSchema, req);

        const snapshot = await slidesService.format(userId, body);
        return sendSuccess(req, res, snapshot, 200);
    }

    async generate(req: Request, res: Response) {
        ddl('route: POST /api/v1/slides/generate/start');
        const userId = authContext(req).currentUser();
        const { body } = requestInput(generateSlidesSchema, req);
        ddl('body ->', body);

        const snapshot = await slidesService.generate(userId, body);
        return sendSuccess(req, res, snapshot, 200);
    }

    async narrate(req: Request, res: Response) {
        ddl('route: POST /api/v1/slides/narration/start');
        const userId = authContext(req).currentUser();
        const { body } = requestInput(narrationSchema, req);

        const snapshot = await slidesService.narrate(userId, body);
        return sendSuccess(req, res, snapshot, 200);
    }
}

export const slidesController = new SlidesController();
