// models/chapter.ts
import { Schema, model, Types } from 'mongoose';

export interface IChapterTranslation {
    title: string;
    content: string;
    translatedAt: Date;
}

export interface IChapter {
    bookId: Types.ObjectId;
    title: string;
    content: string;
    orderIndex: number;
    isDeleted: boolean;
    translations: Map<string, IChapterTranslation>;
    createdAt: Date;
    updatedAt: Date;
}

const chapterTranslationSchema = new Schema<IChapterTranslation>(
    {
        title: { type: String, required: true },
        content: { type: String, required: true },
        translatedAt: { type: Date, required: true },
    },
    { _id: false }
);

const chapterSchema = new Schema<IChapter>(
    {
        bookId: {
            type: Schema.Types.ObjectId,
            ref: 'Book',
            required: true,
        },
        title: { type: String, required: true },
        content: { type: String, default: '' },
        orderIndex: { type: Number, default: 0 },
        isDeleted: { type: Boolean, default: false },
        translations: {
            type: Map,
            of: chapterTranslationSchema,
            default: {},
        },
    },
    {
        timestamps: true,
    }
);

chapterSchema.index({ bookId: 1, orderIndex: 1 });

export const ChapterModel = model<IChapter>('Chapter', chapterSchema, 'chapters');
