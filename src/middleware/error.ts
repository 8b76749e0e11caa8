import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { sendError } from '../lib/apiResponse';
import { APIError } from '../lib/APIError';
import { createLogger } from '../lib/logger';
import { getRequestId } from './requestId';
import { formatZodIssues } from './validate';

const logger = createLogger('http');

export const errorHandler = (
    error: Error,
    req: Request,
    res: Response,
    // Express recognises error middleware by its arity
    _next: NextFunction
) => {
    const requestId = getRequestId(req);

    // Handle custom APIError instances
    if (error instanceof APIError) {
        if (error.statusCode >= 500) {
            logger.error({ err: error, requestId }, error.message);
        }
        const response = {
            success: false,
            error: {
                code: error.errorCode,
                message: error.message,
                ...(error.data !== undefined && { details: error.data }),
            },
            meta: {
                ...error.meta,
                requestId,
                timestamp: new Date().toISOString(),
            },
        };
        return res.status(error.statusCode).json(response);
    }

    if (error instanceof ZodError) {
        return sendError(req, res, 400, 'VALIDATION_ERROR', 'Validation failed', {
            errors: formatZodIssues(error),
        });
    }

    if (error.name === 'UnauthorizedError' || error.name === 'JsonWebTokenError') {
        return sendError(req, res, 401, 'UNAUTHORIZED', error.message);
    }

    logger.error({ err: error, requestId }, 'Unhandled error');

    return sendError(
        req,
        res,
        500,
        'INTERNAL_ERROR',
        error.message || 'An unexpected error occurred'
    );
};

export const notFoundHandler = (req: Request, res: Response) => {
    sendError(
        req,
        res,
        404,
        'NOT_FOUND',
        `Route ${req.method} ${req.path} not found`
    );
};
