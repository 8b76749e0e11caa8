import { describe, expect, it } from 'vitest';
import { SlideFormatCapability } from '../../src/capabilities/slideFormat';
import { SlideGenerationCapability } from '../../src/capabilities/slideGeneration';
import type { SlideFormatTask, SlideGenerationTask } from '../../src/types/queue';
import { MemoryBlobStore, ScriptedTextModel } from '../fakes/collaborators';

const formatTask = (slides: { index: number; html: string }[]): SlideFormatTask => ({
    taskId: 'task-fmt',
    jobId: 'fmt_000000000001',
    userId: 'user-a',
    enqueuedAt: '2026-01-01T00:00:00.000Z',
    queue: 'slide-format',
    payload: { documentId: 'doc-1', formatType: 'format', instruction: null, slides },
});

const generationTask = (minSlides: number, maxSlides: number): SlideGenerationTask => ({
    taskId: 'task-gen',
    jobId: 'gen_000000000001',
    userId: 'user-a',
    enqueuedAt: '2026-01-01T00:00:00.000Z',
    queue: 'slide-generation',
    payload: {
        title: 'Solar power',
        goal: 'Explain the basics',
        slideType: 'academy',
        language: 'en',
        minSlides,
        maxSlides,
        userQuery: null,
    },
});

describe('SlideFormatCapability', () => {
    const model = new ScriptedTextModel(
        (input) => '```html\n' + input.replace('<h1>', '<h1 class="title">') + '\n```'
    );

    it('labels units by slide number and returns slides in index order', async () => {
        const capability = new SlideFormatCapability(model, new MemoryBlobStore());
        const task = formatTask([
            { index: 3, html: '<h1>A</h1>' },
            { index: 1, html: '<h1>B</h1>' },
        ]);

        const units = await capability.open(task);
        const successes = await Promise.all(
            units.map(async (unit) => ({ unit, value: await capability.runUnit(unit, task) }))
        );

        expect(units.map((unit) => unit.label)).toEqual(['Slide 4', 'Slide 2']);
        expect(await capability.buildResult(successes, task)).toEqual({
            document_id: 'doc-1',
            slides: [
                { slide_index: 1, formatted_html: '<h1 class="title">B</h1>' },
                { slide_index: 3, formatted_html: '<h1 class="title">A</h1>' },
            ],
        });
    });

    it('stores a large result and leaves a pointer', async () => {
        const blobStore = new MemoryBlobStore();
        const capability = new SlideFormatCapability(model, blobStore);
        const task = formatTask([{ index: 0, html: 'x'.repeat(70_000) }]);
        const [unit] = await capability.open(task);

        const result = await capability.buildResult(
            [{ unit, value: 'y'.repeat(70_000) }],
            task
        );

        expect(result).toEqual({
            document_id: 'doc-1',
            slides_count: 1,
            result_url: 'http://files.test/uploads/slide-format/1.json',
            result_ref: 'slide-format/1.json',
        });
        const stored = JSON.parse((await blobStore.fetch('slide-format/1.json')).toString('utf8'));
        expect(stored.slides[0].slide_index).toBe(0);
    });

    it('fails a unit when the model answers with nothing', async () => {
        const capability = new SlideFormatCapability(
            new ScriptedTextModel(() => '```\n```'),
            new MemoryBlobStore()
        );
        const task = formatTask([{ index: 0, html: '<p>x</p>' }]);
        const [unit] = await capability.open(task);

        await expect(capability.runUnit(unit, task)).rejects.toThrow('Model returned no HTML');
    });
});

describe('SlideGenerationCapability', () => {
    const outline = JSON.stringify({
        slides: [
            { title: 'Intro', points: ['Hello'] },
            { title: 'Panels', points: ['Cells', 'Inverters'] },
            { title: 'Summary', points: [] },
        ],
    });

    const model = new ScriptedTextModel((input, messages) =>
        messages[0].content.includes('Answer with JSON') ? outline : `<section>${input}</section>`
    );

    it('plans units from the outline, capped at the maximum', async () => {
        const capability = new SlideGenerationCapability(model, new MemoryBlobStore());

        const units = await capability.open(generationTask(2, 2));

        expect(units).toEqual([
            { index: 0, label: 'Intro', title: 'Intro', points: ['Hello'] },
            { index: 1, label: 'Panels', title: 'Panels', points: ['Cells', 'Inverters'] },
        ]);
    });

    it('renders one slide per unit', async () => {
        const capability = new SlideGenerationCapability(model, new MemoryBlobStore());
        const task = generationTask(1, 5);
        const units = await capability.open(task);

        const html = await capability.runUnit(units[1], task);

        expect(html).toBe('<section>Panels\n- Cells\n- Inverters</section>');
    });

    it('fails when the outline is shorter than the minimum', async () => {
        const capability = new SlideGenerationCapability(model, new MemoryBlobStore());

        await expect(capability.open(generationTask(4, 10))).rejects.toThrow(
            'Outline has 3 slides, at least 4 requested'
        );
    });

    it('fails when the outline is not JSON', async () => {
        const capability = new SlideGenerationCapability(
            new ScriptedTextModel(() => 'Here are some slides'),
            new MemoryBlobStore()
        );

        await expect(capability.open(generationTask(1, 5))).rejects.toThrow(
            'Outline is not valid JSON'
        );
    });
});
