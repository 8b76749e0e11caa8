import { Request, Response } from 'express';
import { getRequestId } from '../middleware/requestId';

export interface ResponseMeta {
    requestId?: string;
    timestamp?: string;
    page?: number;
    limit?: number;
    total?: number;
    [key: string]: unknown;
}

export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: {
        code: string;
        message: string;
        details?: unknown;
    };
    meta?: ResponseMeta;
}

export const sendSuccess = <T>(
    req: Request,
    res: Response,
    data: T,
    statusCode = 200,
    meta?: Omit<ResponseMeta, 'requestId' | 'timestamp'>
): Response => {
    const requestId = getRequestId(req);
    const response: ApiResponse<T> = {
        success: true,
        data,
        meta: {
            requestId,
            timestamp: new Date().toISOString(),
            ...meta,
        },
    };
    return res.status(statusCode).json(response);
};

export const sendError = (
    req: Request,
    res: Response,
    statusCode: number,
    code: string,
    message: string,
    details?: unknown
): Response => {
    const requestId = getRequestId(req);
    const response: ApiResponse = {
        success: false,
        error: {
            code,
            message,
            ...(details !== undefined && { details }),
        },
        meta: {
            requestId,
            timestamp: new Date().toISOString(),
        },
    };
    return res.status(statusCode).json(response);
};
