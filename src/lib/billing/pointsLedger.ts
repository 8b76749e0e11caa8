// lib/billing/pointsLedger.ts
import { Types } from 'mongoose';
import { UserModel } from '../../models/user';
import { PointsTransactionModel } from '../../models/pointsTransaction';
import { APIError } from '../APIError';
import type { CostLedger, ReservationResult } from '../../types/collaborators';
import { createLogger } from '../logger';

const logger = createLogger('points-ledger');

const unknownUser = () =>
    new APIError({ code: 401, errorCode: 'UNAUTHORIZED', message: 'Unknown user' });

/**
 * Points balance on the user document. A charge is one conditional $inc, so
 * concurrent requests can never overdraw; nothing here refunds.
 */
export class PointsLedger implements CostLedger {
    async reserve(
        userId: string,
        amount: number,
        reference: { service: string; jobId?: string }
    ): Promise<ReservationResult> {
        if (!Types.ObjectId.isValid(userId)) {
            throw unknownUser();
        }

        const updated = await UserModel.findOneAndUpdate(
            { _id: userId, status: 'active', points: { $gte: amount } },
            { $inc: { points: -amount } },
            { new: true, projection: { points: 1 } }
        ).lean();

        if (!updated) {
            const user = await UserModel.findById(userId, { points: 1 }).lean();
            if (!user) throw unknownUser();
            return { ok: false, balance: user.points };
        }

        await PointsTransactionModel.create({
            userId: new Types.ObjectId(userId),
            type: 'spend',
            amount,
            balanceAfter: updated.points,
            service: reference.service,
            jobId: reference.jobId ?? null,
        });

        logger.info(
            { userId, amount, service: reference.service, jobId: reference.jobId },
            'Points charged'
        );

        return { ok: true, balance: updated.points };
    }

    async isReserved(jobId: string): Promise<boolean> {
        const charge = await PointsTransactionModel.exists({ jobId, type: 'spend' });
        return charge !== null;
    }
}

export const pointsLedger = new PointsLedger();
