import { Request, Response, NextFunction } from 'express';
import { sendError } from '../lib/apiResponse';
import { APIError } from '../lib/APIError';
import Helpers from '../lib/helpers';
import { ddl } from '../lib/dd';
import type { AuthContext } from '../types/collaborators';

export const authenticate = (
    req: Request,
    res: Response,
    next: NextFunction
) => {
    // allow auth token from cookie or header
    const cookieToken: unknown = req.cookies?.authToken;
    const headerToken = req.headers.authorization?.startsWith('Bearer ')
        ? req.headers.authorization.slice('Bearer '.length)
        : undefined;
    const token = typeof cookieToken === 'string' ? cookieToken : headerToken;

    if (!token) {
        return sendError(
            req,
            res,
            401,
            'UNAUTHORIZED',
            'Missing or invalid authorization header'
        );
    }

    const claims = Helpers.verifyJWTToken(token);
    if (!claims) {
        return sendError(req, res, 401, 'UNAUTHORIZED', 'Invalid or expired token');
    }

    ddl('authenticated user ->', claims.sub);
    req.user = { id: claims.sub, email: claims.email };

    next();
};

/**
 * Identity of the caller for producer and status endpoints.
 */
export const authContext = (req: Request): AuthContext => ({
    currentUser() {
        if (!req.user) {
            throw new APIError({
                code: 401,
                message: 'Authentication required',
                errorCode: 'UNAUTHORIZED',
            });
        }
        return req.user.id;
    },
});
