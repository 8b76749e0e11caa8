import { costOf } from '../../config/pricing';
import { jobProducer } from '../../lib/jobs';
import { requireSupportedLanguage } from '../../lib/jobs/preconditions';
import type { JobProducer } from '../../lib/jobs/producer';
import { toSnapshot, type JobSnapshot } from '../../lib/jobs/snapshot';
import type { AiEditorInput } from './schema';

export class AiEditorService {
    constructor(private readonly producer: JobProducer) {}

    async start(userId: string, input: AiEditorInput): Promise<JobSnapshot> {
        if (input.operation === 'bilingual') {
            for (const code of [input.source_language, input.target_language]) {
                if (code !== null) requireSupportedLanguage(code);
            }
        }

        const record = await this.producer.submit({
            userId,
            body: {
                queue: 'ai-editor',
                payload: {
                    documentId: input.document_id,
                    operation: input.operation,
                    contentType: input.content_type,
                    content: input.content,
                    instruction: input.instruction,
                    sourceLanguage: input.source_language,
                    targetLanguage: input.target_language,
                    bilingualStyle: input.bilingual_style,
                },
            },
            unitNoun: null,
            unitsTotal: 1,
            cost: costOf.aiEditor(),
            params: {
                document_id: input.document_id,
                operation: input.operation,
                content_type: input.content_type,
            },
        });

        return toSnapshot(record);
    }
}

export const aiEditorService = new AiEditorService(jobProducer);
