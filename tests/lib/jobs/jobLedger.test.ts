import { describe, expect, it } from 'vitest';
import { fromLedgerRow, toLedgerRow } from '../../../src/lib/jobs/jobLedger';
import { makeJob, T0 } from '../../fakes/fixtures';

describe('ledger rows', () => {
    it('reads back nested result and params as they were written', () => {
        const record = makeJob({
            status: 'completed',
            result: {
                chapters: [{ index: 0, title: 'One', words: 120 }],
                summary: { ok: true, note: null },
            },
            params: { book_id: 'book-1', options: { tone: 'formal', tags: ['a', 'b'] } },
            completedAt: T0.toISOString(),
        });

        const row = toLedgerRow(record);
        expect(row.completedAt).toEqual(T0);

        expect(fromLedgerRow(row)).toEqual(record);
    });

    it('rejects a stored result that is not plain JSON', () => {
        const row = { ...toLedgerRow(makeJob()), result: { at: new Date(0) } };

        expect(() => fromLedgerRow(row)).toThrow();
    });

    it('treats a row without params as empty params', () => {
        const row = { ...toLedgerRow(makeJob()), params: {} };

        expect(fromLedgerRow(row).params).toEqual({});
    });
});
