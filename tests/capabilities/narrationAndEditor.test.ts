import { describe, expect, it } from 'vitest';
import { createWorker } from '../../src/capabilities';
import { AiEditorCapability } from '../../src/capabilities/aiEditor';
import { NarrationAudioCapability } from '../../src/capabilities/narrationAudio';
import type { AiEditorTask, NarrationAudioTask } from '../../src/types/queue';
import {
    FakeBookRepository,
    FakeSpeechModel,
    MemoryBlobStore,
    ScriptedTextModel,
} from '../fakes/collaborators';
import { createTrackerContext } from '../fakes/fixtures';
import { MemoryTaskQueue } from '../fakes/memoryTaskQueue';

const narrationTask: NarrationAudioTask = {
    taskId: 'task-narr',
    jobId: 'narr_000000000001',
    userId: 'user-a',
    enqueuedAt: '2026-01-01T00:00:00.000Z',
    queue: 'narration-audio',
    payload: {
        presentationId: 'pres-1',
        language: 'vi',
        voice: { name: 'Despina', speakingRate: 1 },
        slides: [
            { index: 0, script: 'Xin chào' },
            { index: 1, script: '   ' },
            { index: 2, script: ' Tạm biệt ' },
        ],
    },
};

const editorTask = (content: string): AiEditorTask => ({
    taskId: 'task-edit',
    jobId: 'edit_000000000001',
    userId: 'user-a',
    enqueuedAt: '2026-01-01T00:00:00.000Z',
    queue: 'ai-editor',
    payload: {
        documentId: 'doc-1',
        operation: 'bilingual',
        contentType: 'document',
        content,
        instruction: null,
        sourceLanguage: 'vi',
        targetLanguage: 'en',
        bilingualStyle: 'slash_separated',
    },
});

describe('NarrationAudioCapability', () => {
    it('skips slides without a script', async () => {
        const capability = new NarrationAudioCapability(new FakeSpeechModel(), new MemoryBlobStore());

        const units = await capability.open(narrationTask);

        expect(units).toEqual([
            { index: 0, label: 'Slide 1', script: 'Xin chào' },
            { index: 2, label: 'Slide 3', script: 'Tạm biệt' },
        ]);
    });

    it('synthesizes a slide and stores the audio', async () => {
        const speech = new FakeSpeechModel();
        const blobStore = new MemoryBlobStore();
        const capability = new NarrationAudioCapability(speech, blobStore);
        const [unit] = await capability.open(narrationTask);

        const audio = await capability.runUnit(unit, narrationTask);

        expect(speech.calls).toEqual([
            { text: 'Xin chào', voice: { name: 'Despina', speakingRate: 1, language: 'vi' } },
        ]);
        expect(audio).toEqual({
            ref: 'narration/pres-1/1.wav',
            url: 'http://files.test/uploads/narration/pres-1/1.wav',
        });
        expect(blobStore.blobs.get('narration/pres-1/1.wav')?.contentType).toBe('audio/wav');
    });

    it('lists the audio of each narrated slide', async () => {
        const capability = new NarrationAudioCapability(new FakeSpeechModel(), new MemoryBlobStore());
        const [unit] = await capability.open(narrationTask);

        const result = await capability.buildResult(
            [{ unit, value: { ref: 'r', url: 'http://files.test/uploads/r' } }],
            narrationTask
        );

        expect(result).toEqual({
            presentation_id: 'pres-1',
            language: 'vi',
            voice_name: 'Despina',
            audio_files: [{ slide_index: 0, audio_url: 'http://files.test/uploads/r' }],
        });
    });
});

describe('AiEditorCapability', () => {
    it('runs the whole document as one unit', async () => {
        const model = new ScriptedTextModel((input) => `${input}<p>Hello / Xin chào</p>`);
        const capability = new AiEditorCapability(model, new MemoryBlobStore());
        const task = editorTask('<p>Xin chào</p>');

        const units = await capability.open(task);
        const content = await capability.runUnit(units[0], task);

        expect(units).toEqual([{ index: 0, label: 'Adding translation' }]);
        expect(await capability.buildResult([{ unit: units[0], value: content }], task)).toEqual({
            document_id: 'doc-1',
            operation: 'bilingual',
            content_type: 'document',
            content: '<p>Xin chào</p><p>Hello / Xin chào</p>',
        });
    });

    it('fails when the model returns nothing', async () => {
        const capability = new AiEditorCapability(
            new ScriptedTextModel(() => ''),
            new MemoryBlobStore()
        );
        const task = editorTask('<p>x</p>');
        const [unit] = await capability.open(task);

        await expect(capability.runUnit(unit, task)).rejects.toThrow('Model returned no content');
    });
});

describe('createWorker', () => {
    it('builds a runner for the requested queue without loading unused models', () => {
        const { tracker } = createTrackerContext();
        const runner = createWorker('narration-audio', {
            taskQueue: new MemoryTaskQueue(),
            tracker,
            books: new FakeBookRepository(),
            blobStore: new MemoryBlobStore(),
            textModel: () => {
                throw new Error('text model not configured');
            },
            speechModel: () => new FakeSpeechModel(),
            workerId: 'worker-1',
        });

        expect(runner.queue).toBe('narration-audio');
    });
});
