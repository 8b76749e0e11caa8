// capabilities/slideFormat.ts
import type { Capability, UnitSuccess, WorkUnit } from '../lib/jobs/capability';
import type { BlobStore } from '../types/collaborators';
import type { JsonObject } from '../types/job';
import type { TextModel } from '../types/llm';
import type { SlideFormatTask, Task } from '../types/queue';
import { slideFormatMessages, stripCodeFence } from './prompts';
import { inlineOrStore } from './result';

export interface SlideUnit extends WorkUnit {
    html: string;
}

export const slideLabel = (index: number): string => `Slide ${index + 1}`;

export class SlideFormatCapability implements Capability<'slide-format', SlideUnit, string> {
    readonly queue = 'slide-format' as const;
    readonly unitNoun = 'slide' as const;

    constructor(
        private readonly model: TextModel,
        private readonly blobStore: BlobStore
    ) {}

    parse(task: Task): SlideFormatTask | null {
        return task.queue === 'slide-format' ? task : null;
    }

    async open(task: SlideFormatTask): Promise<SlideUnit[]> {
        return task.payload.slides.map((slide) => ({
            index: slide.index,
            label: slideLabel(slide.index),
            html: slide.html,
        }));
    }

    async runUnit(unit: SlideUnit, task: SlideFormatTask): Promise<string> {
        const { formatType, instruction } = task.payload;
        const response = await this.model.complete(
            slideFormatMessages(unit.html, formatType, instruction),
            { temperature: 0.4 }
        );

        const html = stripCodeFence(response.content);
        if (!html) {
            throw new Error('Model returned no HTML');
        }
        return html;
    }

    async buildResult(
        successes: UnitSuccess<SlideUnit, string>[],
        task: SlideFormatTask
    ): Promise<JsonObject> {
        const slides = successes
            .map(({ unit, value }) => ({ slide_index: unit.index, formatted_html: value }))
            .sort((a, b) => a.slide_index - b.slide_index);

        return inlineOrStore(
            { document_id: task.payload.documentId, slides },
            { document_id: task.payload.documentId, slides_count: slides.length },
            this.blobStore,
            'slide-format'
        );
    }
}
