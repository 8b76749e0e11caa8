// lib/books/bookRepository.ts
import { Types } from 'mongoose';
import { BookModel } from '../../models/book';
import { ChapterModel } from '../../models/chapter';

export interface BookSource {
    id: string;
    userId: string;
    title: string;
    description: string | null;
    language: string;
}

export interface ChapterSource {
    id: string;
    title: string;
    content: string;
    orderIndex: number;
}

export interface BookRepository {
    /** Non-deleted book, or null */
    findBook(bookId: string): Promise<BookSource | null>;
    /** Non-deleted chapters in reading order */
    listChapters(bookId: string): Promise<ChapterSource[]>;
    countChapters(bookId: string): Promise<number>;
    saveBookTranslation(
        bookId: string,
        language: string,
        translation: { title: string; description: string | null }
    ): Promise<void>;
    saveChapterTranslation(
        chapterId: string,
        language: string,
        translation: { title: string; content: string }
    ): Promise<void>;
}

export class MongoBookRepository implements BookRepository {
    async findBook(bookId: string): Promise<BookSource | null> {
        if (!Types.ObjectId.isValid(bookId)) return null;

        const book = await BookModel.findOne({ _id: bookId, isDeleted: { $ne: true } })
            .select('userId title description language')
            .lean();
        if (!book) return null;

        return {
            id: String(book._id),
            userId: book.userId,
            title: book.title,
            description: book.description ?? null,
            language: book.language,
        };
    }

    async listChapters(bookId: string): Promise<ChapterSource[]> {
        if (!Types.ObjectId.isValid(bookId)) return [];

        const chapters = await ChapterModel.find({
            bookId: new Types.ObjectId(bookId),
            isDeleted: { $ne: true },
        })
            .sort({ orderIndex: 1 })
            .select('title content orderIndex')
            .lean();

        return chapters.map((chapter) => ({
            id: String(chapter._id),
            title: chapter.title,
            content: chapter.content,
            orderIndex: chapter.orderIndex,
        }));
    }

    async countChapters(bookId: string): Promise<number> {
        if (!Types.ObjectId.isValid(bookId)) return 0;

        return ChapterModel.countDocuments({
            bookId: new Types.ObjectId(bookId),
            isDeleted: { $ne: true },
        });
    }

    async saveBookTranslation(
        bookId: string,
        language: string,
        translation: { title: string; description: string | null }
    ): Promise<void> {
        await BookModel.updateOne(
            { _id: bookId },
            {
                $set: {
                    [`translations.${language}`]: {
                        ...translation,
                        translatedAt: new Date(),
                    },
                },
            }
        );
    }

    async saveChapterTranslation(
        chapterId: string,
        language: string,
        translation: { title: string; content: string }
    ): Promise<void> {
        await ChapterModel.updateOne(
            { _id: chapterId },
            {
                $set: {
                    [`translations.${language}`]: {
                        ...translation,
                        translatedAt: new Date(),
                    },
                },
            }
        );
    }
}

export const bookRepository = new MongoBookRepository();
