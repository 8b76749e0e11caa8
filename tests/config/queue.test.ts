import { describe, expect, it } from 'vitest';
import { parseWorkerQueues, queueConfig } from '../../src/config/queue';
import { costOf } from '../../src/config/pricing';
import { QUEUE_NAMES } from '../../src/types/job';

describe('parseWorkerQueues', () => {
    it('runs every queue when none are named', () => {
        expect(parseWorkerQueues('')).toEqual([...QUEUE_NAMES]);
    });

    it('accepts a comma-separated subset', () => {
        expect(parseWorkerQueues(' translation, narration-audio ,')).toEqual([
            'translation',
            'narration-audio',
        ]);
    });

    it('rejects an unknown queue', () => {
        expect(() => parseWorkerQueues('translation,video')).toThrow('Unknown worker queue "video"');
    });
});

describe('queueConfig', () => {
    it('routes every capability to its own durable queue', () => {
        const names = QUEUE_NAMES.map((queue) => queueConfig.queues[queue].name);

        expect(new Set(names).size).toBe(QUEUE_NAMES.length);
        expect(QUEUE_NAMES.every((queue) => queueConfig.queues[queue].durable)).toBe(true);
    });
});

describe('costOf', () => {
    it('prices each capability', () => {
        expect(costOf.translation(3)).toBe(8);
        expect(costOf.slideFormat(6)).toBe(4);
        expect(costOf.slideGeneration(10)).toBe(5);
        expect(costOf.slideGeneration(11)).toBe(10);
        expect(costOf.narrationAudio(4)).toBe(8);
        expect(costOf.aiEditor()).toBe(2);
    });
});
