import { Request, Response } from 'express';
import { sendSuccess } from '../../lib/apiResponse';
import { ddl } from '../../lib/dd';
import { authContext } from '../../middleware/auth';
import { requestInput } from '../../middleware/validate';
import { aiEditorSchema } from './schema';
import { aiEditorService } from './service';

class AiEditorController {
    async start(req: Request, res: Response) {
        ddl('route: POST /api/v1/ai-editor/start');
        const userId = authContext(req).currentUser();
        const { body } = requestInput(aiEditorSchema, req);
        ddl('operation ->', body.operation);

        const snapshot = await aiEditorService.start(userId, body);
        return sendSuccess(req, res, snapshot, 200);
    }
}

export const aiEditorController = new AiEditorController();
