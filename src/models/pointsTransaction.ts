// models/pointsTransaction.ts - Audit trail for points charges
import { Schema, model, Types } from 'mongoose';

export interface IPointsTransaction {
    userId: Types.ObjectId;
    type: 'spend';
    amount: number;
    balanceAfter: number;
    service: string;
    jobId: string | null;
    createdAt: Date;
    updatedAt: Date;
}

const pointsTransactionSchema = new Schema<IPointsTransaction>(
    {
        userId: {
            type: Schema.Types.ObjectId,
            ref: 'User',
            required: true,
        },
        type: {
            type: String,
            enum: ['spend'],
            required: true,
        },
        amount: { type: Number, required: true },
        balanceAfter: { type: Number, required: true },

        // What the points paid for
        service: { type: String, required: true },
        jobId: { type: String, default: null },
    },
    {
        timestamps: true,
    }
);

pointsTransactionSchema.index({ userId: 1, createdAt: -1 });
pointsTransactionSchema.index({ jobId: 1 }, { sparse: true });

export const PointsTransactionModel = model<IPointsTransaction>(
    'PointsTransaction',
    pointsTransactionSchema,
    'points_transactions'
);
