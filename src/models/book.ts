// models/book.ts
import { Schema, model } from 'mongoose';

export interface IBookTranslation {
    title: string;
    description: string | null;
    translatedAt: Date;
}

export interface IBook {
    userId: string;
    title: string;
    description: string | null;
    language: string;
    isDeleted: boolean;
    translations: Map<string, IBookTranslation>;
    createdAt: Date;
    updatedAt: Date;
}

const bookTranslationSchema = new Schema<IBookTranslation>(
    {
        title: { type: String, required: true },
        description: { type: String, default: null },
        translatedAt: { type: Date, required: true },
    },
    { _id: false }
);

const bookSchema = new Schema<IBook>(
    {
        userId: {
            type: String,
            required: true,
            index: true,
        },
        title: { type: String, required: true },
        description: { type: String, default: null },
        language: { type: String, default: 'vi' },
        isDeleted: { type: Boolean, default: false },

        // Keyed by target language code
        translations: {
            type: Map,
            of: bookTranslationSchema,
            default: {},
        },
    },
    {
        timestamps: true,
    }
);

export const BookModel = model<IBook>('Book', bookSchema, 'books');
