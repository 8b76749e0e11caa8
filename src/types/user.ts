// types/user.ts
import { Document, Types } from 'mongoose';

export interface IUser {
    name: string;
    email: string;
    role: 'user' | 'admin';
    /** Spendable balance; charged when a job is accepted */
    points: number;
    status: 'active' | 'suspended' | 'deleted';
    createdAt: Date;
    updatedAt: Date;
}

export interface IUserDocument extends IUser, Document {
    _id: Types.ObjectId;
}
