import { costOf } from '../../config/pricing';
import { APIError } from '../../lib/APIError';
import { bookRepository, type BookRepository } from '../../lib/books/bookRepository';
import { jobProducer } from '../../lib/jobs';
import { requireSupportedLanguage } from '../../lib/jobs/preconditions';
import type { JobProducer } from '../../lib/jobs/producer';
import { toSnapshot, type JobSnapshot } from '../../lib/jobs/snapshot';
import type { JobListOptions } from '../../types/job';
import { jobsService, type CancelView, type JobsService, type SnapshotPage } from '../jobs/service';
import type { StartTranslationInput } from './schema';

export class TranslationService {
    constructor(
        private readonly books: BookRepository,
        private readonly producer: JobProducer,
        private readonly jobs: JobsService
    ) {}

    /**
     * Checks the book and charges `2 + 2 × chapters` before queueing the job
     */
    async start(
        userId: string,
        bookId: string,
        input: StartTranslationInput
    ): Promise<JobSnapshot> {
        const targetLanguage = input.target_language;
        requireSupportedLanguage(targetLanguage);

        const book = await this.books.findBook(bookId);
        if (!book || book.userId !== userId) {
            throw new APIError({
                code: 404,
                errorCode: 'BOOK_NOT_FOUND',
                message: 'Book not found',
            });
        }

        const sourceLanguage = input.source_language ?? book.language;
        const chapters = await this.books.countChapters(bookId);

        const record = await this.producer.submit({
            userId,
            body: {
                queue: 'translation',
                payload: { bookId, targetLanguage, sourceLanguage },
            },
            unitNoun: 'chapter',
            unitsTotal: chapters,
            cost: costOf.translation(chapters),
            params: {
                book_id: bookId,
                target_language: targetLanguage,
                source_language: sourceLanguage,
            },
        });

        return toSnapshot(record);
    }

    async status(userId: string, bookId: string, jobId: string): Promise<JobSnapshot> {
        const snapshot = await this.jobs.getJob(userId, jobId, 'translation');
        if (snapshot.book_id !== bookId) {
            throw new APIError({ code: 404, errorCode: 'JOB_NOT_FOUND', message: 'Job not found' });
        }
        return snapshot;
    }

    async cancel(userId: string, bookId: string, jobId: string): Promise<CancelView> {
        await this.status(userId, bookId, jobId);
        return this.jobs.cancelJob(userId, jobId, 'translation');
    }

    async list(
        userId: string,
        bookId: string,
        options: Pick<JobListOptions, 'limit' | 'skip'>
    ): Promise<SnapshotPage> {
        return this.jobs.listJobs(userId, {
            ...options,
            queue: 'translation',
            params: { book_id: bookId },
        });
    }
}

export const translationService = new TranslationService(bookRepository, jobProducer, jobsService);
