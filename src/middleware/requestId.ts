import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

/**
 * Middleware to generate and attach a unique request ID to each request
 * The requestId can be accessed via req.id or req.headers['x-request-id']
 */
export const requestIdMiddleware = (
    req: Request,
    res: Response,
    next: NextFunction
) => {
    // Reuse an upstream id (e.g. from a load balancer) when present
    const header = req.headers['x-request-id'];
    const requestId = (typeof header === 'string' && header) || randomUUID();

    req.id = requestId;
    res.setHeader('X-Request-ID', requestId);

    next();
};

/**
 * Helper function to get requestId from request object
 */
export const getRequestId = (req: Request): string => {
    const header = req.headers['x-request-id'];
    return req.id || (typeof header === 'string' ? header : '') || randomUUID();
};
