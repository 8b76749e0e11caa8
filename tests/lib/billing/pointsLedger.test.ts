import { describe, expect, it } from 'vitest';
import { APIError } from '../../../src/lib/APIError';
import { PointsLedger } from '../../../src/lib/billing/pointsLedger';

describe('PointsLedger', () => {
    it('refuses a user id that cannot name a user as unauthorized', async () => {
        const error = await new PointsLedger()
            .reserve('not-an-id', 2, { service: 'translation' })
            .catch((err: unknown) => err);

        expect(error).toBeInstanceOf(APIError);
        expect(error).toMatchObject({ statusCode: 401, errorCode: 'UNAUTHORIZED' });
    });
});
