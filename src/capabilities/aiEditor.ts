// capabilities/aiEditor.ts
import type { Capability, UnitSuccess, WorkUnit } from '../lib/jobs/capability';
import type { BlobStore } from '../types/collaborators';
import type { JsonObject } from '../types/job';
import type { TextModel } from '../types/llm';
import type { AiEditorTask, Task } from '../types/queue';
import { editorMessages, stripCodeFence } from './prompts';
import { inlineOrStore } from './result';

const operationLabels = {
    edit: 'Editing content',
    format: 'Formatting content',
    bilingual: 'Adding translation',
} as const;

/**
 * Single-unit job: one model call over the whole document.
 */
export class AiEditorCapability implements Capability<'ai-editor', WorkUnit, string> {
    readonly queue = 'ai-editor' as const;
    readonly unitNoun = null;

    constructor(
        private readonly model: TextModel,
        private readonly blobStore: BlobStore
    ) {}

    parse(task: Task): AiEditorTask | null {
        return task.queue === 'ai-editor' ? task : null;
    }

    async open(task: AiEditorTask): Promise<WorkUnit[]> {
        return [{ index: 0, label: operationLabels[task.payload.operation] }];
    }

    async runUnit(_unit: WorkUnit, task: AiEditorTask): Promise<string> {
        const response = await this.model.complete(editorMessages(task.payload), {
            temperature: 0.3,
            maxTokens: 16000,
        });

        const html = stripCodeFence(response.content);
        if (!html) {
            throw new Error('Model returned no content');
        }
        return html;
    }

    async buildResult(
        successes: UnitSuccess<WorkUnit, string>[],
        task: AiEditorTask
    ): Promise<JsonObject> {
        const { documentId, operation, contentType } = task.payload;
        const content = successes[0]?.value ?? '';

        return inlineOrStore(
            { document_id: documentId, operation, content_type: contentType, content },
            { document_id: documentId, operation, content_type: contentType },
            this.blobStore,
            'ai-editor'
        );
    }
}
