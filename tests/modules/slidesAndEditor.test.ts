import { describe, expect, it } from 'vitest';
import { aiEditorSchema } from '../../src/modules/aiEditor/schema';
import { AiEditorService } from '../../src/modules/aiEditor/service';
import { formatSlidesSchema, generateSlidesSchema, narrationSchema } from '../../src/modules/slides/schema';
import { SlidesService } from '../../src/modules/slides/service';
import { createJobContext, rejection } from './setup';

describe('SlidesService', () => {
    it('keeps slide positions as indexes and prices by batches of five', async () => {
        const { producer, queue } = createJobContext();
        const service = new SlidesService(producer);
        const { body } = formatSlidesSchema.parse({
            body: { slides: Array.from({ length: 6 }, (_, i) => ({ html: `<h1>${i}</h1>` })) },
        });

        const snapshot = await service.format('user-a', body);

        expect(snapshot).toMatchObject({
            status: 'pending',
            slides_total: 6,
            points_deducted: 4,
            document_id: null,
            format_type: 'format',
        });
        const [task] = queue.enqueued;
        expect(task.queue === 'slide-format' ? task.payload.slides.map((s) => s.index) : []).toEqual([
            0, 1, 2, 3, 4, 5,
        ]);
    });

    it('charges slide generation on the requested maximum', async () => {
        const { producer } = createJobContext();
        const service = new SlidesService(producer);
        const { body } = generateSlidesSchema.parse({
            body: { title: 'Solar power', language: 'en', min_slides: 8, max_slides: 12 },
        });

        const snapshot = await service.generate('user-a', body);

        expect(snapshot).toMatchObject({
            slides_total: 12,
            points_deducted: 10,
            title: 'Solar power',
            slide_type: 'academy',
        });
    });

    it('narrates only slides that have a script', async () => {
        const { producer, queue } = createJobContext();
        const service = new SlidesService(producer);
        const { body } = narrationSchema.parse({
            body: {
                presentation_id: 'pres-1',
                slides: [
                    { index: 0, script: 'Một' },
                    { index: 1, script: '  ' },
                    { index: 2, script: 'Ba' },
                ],
            },
        });

        const snapshot = await service.narrate('user-a', body);

        expect(snapshot).toMatchObject({ slides_total: 2, points_deducted: 4, voice_name: 'Despina' });
        expect(queue.enqueued[0]).toMatchObject({
            payload: {
                voice: { name: 'Despina', speakingRate: 1 },
                slides: [
                    { index: 0, script: 'Một' },
                    { index: 2, script: 'Ba' },
                ],
            },
        });
    });

    it('refuses narration when no slide has a script', async () => {
        const { producer, costLedger } = createJobContext();
        const service = new SlidesService(producer);
        const { body } = narrationSchema.parse({
            body: { presentation_id: 'pres-1', slides: [{ index: 0, script: ' ' }] },
        });

        const error = await rejection(service.narrate('user-a', body));

        expect(error).toMatchObject({ errorCode: 'NOTHING_TO_PROCESS' });
        expect(costLedger.charges).toHaveLength(0);
    });

    it('rejects a minimum above the maximum', () => {
        const parsed = generateSlidesSchema.safeParse({
            body: { title: 'x', min_slides: 6, max_slides: 5 },
        });

        expect(parsed.success).toBe(false);
    });
});

describe('AiEditorService', () => {
    it('queues a single-unit job for two points', async () => {
        const { producer, queue } = createJobContext();
        const service = new AiEditorService(producer);
        const { body } = aiEditorSchema.parse({
            body: { document_id: 'doc-1', operation: 'format', content: '<p>hi</p>' },
        });

        const snapshot = await service.start('user-a', body);

        expect(snapshot).toMatchObject({
            job_type: 'ai-editor',
            units_total: 1,
            points_deducted: 2,
            estimated_time_remaining_seconds: null,
            document_id: 'doc-1',
            operation: 'format',
        });
        expect(queue.enqueued[0].queue).toBe('ai-editor');
    });

    it('refuses an unsupported bilingual target', async () => {
        const { producer } = createJobContext();
        const service = new AiEditorService(producer);
        const { body } = aiEditorSchema.parse({
            body: {
                document_id: 'doc-1',
                operation: 'bilingual',
                content: '<p>hi</p>',
                target_language: 'zz',
            },
        });

        await expect(service.start('user-a', body)).rejects.toMatchObject({
            errorCode: 'UNSUPPORTED_LANGUAGE',
        });
    });

    it('requires an instruction for edits', () => {
        const parsed = aiEditorSchema.safeParse({
            body: { document_id: 'doc-1', operation: 'edit', content: '<p>hi</p>' },
        });

        expect(parsed.success).toBe(false);
    });
});
