// capabilities/slideGeneration.ts
import { z } from 'zod';
import type { Capability, UnitSuccess, WorkUnit } from '../lib/jobs/capability';
import type { BlobStore } from '../types/collaborators';
import type { JsonObject } from '../types/job';
import type { TextModel } from '../types/llm';
import type { SlideGenerationTask, Task } from '../types/queue';
import { outlineMessages, slideRenderMessages, stripCodeFence } from './prompts';
import { inlineOrStore } from './result';

const outlineSchema = z.object({
    slides: z
        .array(
            z.object({
                title: z.string().min(1),
                points: z.array(z.string()).default([]),
            })
        )
        .min(1),
});

export interface OutlineSlideUnit extends WorkUnit {
    title: string;
    points: string[];
}

/**
 * Plans an outline in `open`, then renders one slide per unit.
 */
export class SlideGenerationCapability
    implements Capability<'slide-generation', OutlineSlideUnit, string>
{
    readonly queue = 'slide-generation' as const;
    readonly unitNoun = 'slide' as const;

    constructor(
        private readonly model: TextModel,
        private readonly blobStore: BlobStore
    ) {}

    parse(task: Task): SlideGenerationTask | null {
        return task.queue === 'slide-generation' ? task : null;
    }

    async open(task: SlideGenerationTask): Promise<OutlineSlideUnit[]> {
        const { minSlides, maxSlides } = task.payload;
        const response = await this.model.complete(outlineMessages(task.payload), {
            json: true,
            temperature: 0.7,
        });

        let raw: unknown;
        try {
            raw = JSON.parse(stripCodeFence(response.content));
        } catch {
            throw new Error('Outline is not valid JSON');
        }

        const outline = outlineSchema.safeParse(raw);
        if (!outline.success) {
            throw new Error('Outline does not list any slides');
        }

        const slides = outline.data.slides.slice(0, maxSlides);
        if (slides.length < minSlides) {
            throw new Error(`Outline has ${slides.length} slides, at least ${minSlides} requested`);
        }

        return slides.map((slide, position) => ({
            index: position,
            label: slide.title,
            title: slide.title,
            points: slide.points,
        }));
    }

    async runUnit(unit: OutlineSlideUnit, task: SlideGenerationTask): Promise<string> {
        const response = await this.model.complete(
            slideRenderMessages(task.payload.title, unit, task.payload.language),
            { temperature: 0.6 }
        );

        const html = stripCodeFence(response.content);
        if (!html) {
            throw new Error('Model returned no HTML');
        }
        return html;
    }

    async buildResult(
        successes: UnitSuccess<OutlineSlideUnit, string>[],
        task: SlideGenerationTask
    ): Promise<JsonObject> {
        const slides = successes.map(({ unit, value }) => ({
            slide_index: unit.index,
            title: unit.title,
            html: value,
        }));

        return inlineOrStore(
            { title: task.payload.title, slide_type: task.payload.slideType, slides },
            { title: task.payload.title, slides_count: slides.length },
            this.blobStore,
            'slide-generation'
        );
    }
}
