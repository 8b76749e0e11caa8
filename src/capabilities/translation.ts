// capabilities/translation.ts
import type { BookRepository } from '../lib/books/bookRepository';
import type { Capability, UnitSuccess, WorkUnit } from '../lib/jobs/capability';
import type { JsonObject } from '../types/job';
import type { TextModel } from '../types/llm';
import type { Task, TranslationTask } from '../types/queue';
import { stripCodeFence, translationMessages } from './prompts';

export interface ChapterUnit extends WorkUnit {
    chapterId: string;
    title: string;
    content: string;
}

export interface TranslatedChapter {
    chapterId: string;
    title: string;
}

/**
 * Translates a book chapter by chapter and saves each translation on its
 * chapter under the target language.
 */
export class TranslationCapability
    implements Capability<'translation', ChapterUnit, TranslatedChapter>
{
    readonly queue = 'translation' as const;
    readonly unitNoun = 'chapter' as const;

    constructor(
        private readonly books: BookRepository,
        private readonly model: TextModel
    ) {}

    parse(task: Task): TranslationTask | null {
        return task.queue === 'translation' ? task : null;
    }

    private async translate(
        text: string,
        task: TranslationTask,
        format: 'html' | 'plain'
    ): Promise<string> {
        if (!text.trim()) return text;

        const { sourceLanguage, targetLanguage } = task.payload;
        const response = await this.model.complete(
            translationMessages(text, sourceLanguage, targetLanguage, format),
            { temperature: 0.3 }
        );

        const translated = stripCodeFence(response.content);
        if (!translated) {
            throw new Error('Empty translation');
        }
        return translated;
    }

    /**
     * Book metadata goes first; if it cannot be translated the job fails
     * before any chapter is touched.
     */
    async open(task: TranslationTask): Promise<ChapterUnit[]> {
        const { bookId, targetLanguage } = task.payload;

        const book = await this.books.findBook(bookId);
        if (!book) {
            throw new Error(`Book ${bookId} not found`);
        }

        const title = await this.translate(book.title, task, 'plain');
        const description = book.description
            ? await this.translate(book.description, task, 'plain')
            : null;
        await this.books.saveBookTranslation(bookId, targetLanguage, { title, description });

        const chapters = await this.books.listChapters(bookId);
        return chapters.map((chapter, position) => ({
            index: position,
            label: chapter.title,
            chapterId: chapter.id,
            title: chapter.title,
            content: chapter.content,
        }));
    }

    async runUnit(unit: ChapterUnit, task: TranslationTask): Promise<TranslatedChapter> {
        const title = await this.translate(unit.title, task, 'plain');
        const content = await this.translate(unit.content, task, 'html');

        await this.books.saveChapterTranslation(unit.chapterId, task.payload.targetLanguage, {
            title,
            content,
        });

        return { chapterId: unit.chapterId, title };
    }

    async buildResult(
        successes: UnitSuccess<ChapterUnit, TranslatedChapter>[],
        task: TranslationTask
    ): Promise<JsonObject> {
        return {
            book_id: task.payload.bookId,
            target_language: task.payload.targetLanguage,
            translated_chapters: successes.map(({ unit, value }) => ({
                index: unit.index,
                chapter_id: value.chapterId,
                title: value.title,
            })),
        };
    }
}
