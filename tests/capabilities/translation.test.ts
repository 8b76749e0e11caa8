import { describe, expect, it } from 'vitest';
import { TranslationCapability } from '../../src/capabilities/translation';
import { WorkerHarness } from '../../src/lib/jobs/workerHarness';
import { FakeBookRepository, ScriptedTextModel } from '../fakes/collaborators';
import { createTrackerContext, makeJob, makeTranslationTask } from '../fakes/fixtures';
import { MemoryTaskQueue } from '../fakes/memoryTaskQueue';

function library(): FakeBookRepository {
    const books = new FakeBookRepository();
    books.addBook(
        { id: 'book-1', userId: 'user-a', title: 'Sách', description: 'Mô tả', language: 'vi' },
        [
            { id: 'ch-2', title: 'Chương 2', content: '<p>Hai</p>', orderIndex: 2 },
            { id: 'ch-1', title: 'Chương 1', content: '<p>Một</p>', orderIndex: 1 },
            { id: 'ch-3', title: 'Chương 3', content: '<p>Ba</p>', orderIndex: 3 },
        ]
    );
    return books;
}

const prefixing = new ScriptedTextModel((input) => `EN:${input}`);

describe('TranslationCapability', () => {
    it('translates the book metadata and splits chapters in reading order', async () => {
        const books = library();
        const capability = new TranslationCapability(books, prefixing);

        const units = await capability.open(makeTranslationTask());

        expect(units.map(({ index, label, chapterId }) => ({ index, label, chapterId }))).toEqual([
            { index: 0, label: 'Chương 1', chapterId: 'ch-1' },
            { index: 1, label: 'Chương 2', chapterId: 'ch-2' },
            { index: 2, label: 'Chương 3', chapterId: 'ch-3' },
        ]);
        expect(books.bookTranslations.get('book-1:en')).toEqual({
            title: 'EN:Sách',
            description: 'EN:Mô tả',
        });
    });

    it('saves each translated chapter under the target language', async () => {
        const books = library();
        const capability = new TranslationCapability(books, prefixing);
        const task = makeTranslationTask();
        const [first] = await capability.open(task);

        const translated = await capability.runUnit(first, task);

        expect(translated).toEqual({ chapterId: 'ch-1', title: 'EN:Chương 1' });
        expect(books.chapterTranslations.get('ch-1:en')).toEqual({
            title: 'EN:Chương 1',
            content: 'EN:<p>Một</p>',
        });
    });

    it('strips a markdown fence around the answer', async () => {
        const books = library();
        const fenced = new ScriptedTextModel((input) => '```html\n' + input + '\n```');
        const capability = new TranslationCapability(books, fenced);
        const task = makeTranslationTask();
        const [first] = await capability.open(task);

        await capability.runUnit(first, task);

        expect(books.chapterTranslations.get('ch-1:en')?.content).toBe('<p>Một</p>');
    });

    it('fails a unit on an empty translation', async () => {
        const books = library();
        const blank = new ScriptedTextModel((input) => (input.startsWith('<p>') ? '   ' : input));
        const capability = new TranslationCapability(books, blank);
        const task = makeTranslationTask();
        const [first] = await capability.open(task);

        await expect(capability.runUnit(first, task)).rejects.toThrow('Empty translation');
    });

    it('fails to open a missing book', async () => {
        const capability = new TranslationCapability(new FakeBookRepository(), prefixing);

        await expect(
            capability.open(
                makeTranslationTask({
                    payload: { bookId: 'book-x', targetLanguage: 'en', sourceLanguage: 'vi' },
                })
            )
        ).rejects.toThrow('Book book-x not found');
    });

    it('completes a book with one failing chapter', async () => {
        const books = library();
        const flaky = new ScriptedTextModel((input) => {
            if (input === '<p>Hai</p>') throw new Error('model unavailable');
            return `EN:${input}`;
        });
        const { tracker } = createTrackerContext();
        const queue = new MemoryTaskQueue();
        await tracker.create(makeJob());
        await queue.enqueue(makeTranslationTask());

        const harness = new WorkerHarness(new TranslationCapability(books, flaky), queue, tracker, {
            workerId: 'worker-1',
            dequeueTimeoutMs: 10,
            idleDelayMs: 0,
            heartbeatMs: 60_000,
            staleAfterMs: 600_000,
            taskTtlMs: 0,
            reapIntervalMs: 0,
            retry: { attempts: 2, baseDelayMs: 0, timeoutMs: 0 },
            allUnitsFailedStatus: 'failed',
        });
        await harness.runOnce();

        expect(await tracker.get('trans_000000000001')).toMatchObject({
            status: 'completed',
            unitsCompleted: 2,
            unitsFailed: 1,
            failedUnits: [{ index: 1, label: 'Chương 2', error: 'model unavailable' }],
            result: {
                book_id: 'book-1',
                target_language: 'en',
                translated_chapters: [
                    { index: 0, chapter_id: 'ch-1', title: 'EN:Chương 1' },
                    { index: 2, chapter_id: 'ch-3', title: 'EN:Chương 3' },
                ],
            },
        });
        expect(books.chapterTranslations.has('ch-2:en')).toBe(false);
    });
});
