// config/pricing.ts
import type { QueueName } from '../types/job';

// Points charged when a job is accepted; never refunded
export const pricing = {
    translation: {
        base: 2,
        perChapter: 2,
    },
    slideFormat: {
        perBatch: 2,
        batchSize: 5,
    },
    slideGeneration: {
        perBatch: 5,
        batchSize: 10,
    },
    narrationAudio: {
        perSlide: 2,
    },
    aiEditor: {
        flat: 2,
    },
};

export const costOf = {
    translation: (chapters: number) =>
        pricing.translation.base + pricing.translation.perChapter * chapters,
    slideFormat: (slides: number) =>
        pricing.slideFormat.perBatch * Math.ceil(slides / pricing.slideFormat.batchSize),
    slideGeneration: (maxSlides: number) =>
        pricing.slideGeneration.perBatch *
        Math.ceil(maxSlides / pricing.slideGeneration.batchSize),
    narrationAudio: (slides: number) => pricing.narrationAudio.perSlide * slides,
    aiEditor: () => pricing.aiEditor.flat,
};

// Job id prefixes, one per capability
export const jobIdPrefix: Record<QueueName, string> = {
    translation: 'trans',
    'slide-format': 'fmt',
    'slide-generation': 'gen',
    'narration-audio': 'narr',
    'ai-editor': 'edit',
};
