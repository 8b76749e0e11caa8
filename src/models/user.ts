import { Schema, model } from 'mongoose';
import { IUserDocument } from '../types/user';

const userSchema = new Schema<IUserDocument>(
    {
        name: { type: String, required: true },
        email: { type: String, required: true, unique: true },
        role: {
            type: String,
            enum: ['user', 'admin'],
            default: 'user',
        },

        // Points balance
        points: {
            type: Number,
            default: 0,
            min: 0,
        },

        // Status
        status: {
            type: String,
            enum: ['active', 'suspended', 'deleted'],
            default: 'active',
        },
    },
    {
        timestamps: true,
        toJSON: {
            virtuals: true,
        },
        toObject: {
            virtuals: true,
        },
    }
);

export const UserModel = model<IUserDocument>('User', userSchema, 'users');
