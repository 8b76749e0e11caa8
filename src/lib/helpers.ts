import jwt from 'jsonwebtoken';
import env from '../config/env';

export interface TokenClaims {
    sub: string;
    email?: string;
}

class Helpers {
    generateJWTToken(claims: TokenClaims, expiresIn: jwt.SignOptions['expiresIn'] = '10h') {
        return jwt.sign(claims, env.JWT_SECRET, { expiresIn });
    }

    /**
     * Verifies a bearer token and returns its claims, or null when the token
     * is malformed, expired, or carries no subject.
     */
    verifyJWTToken(token: string): TokenClaims | null {
        try {
            const decoded = jwt.verify(token, env.JWT_SECRET);
            if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
                return null;
            }
            return {
                sub: decoded.sub,
                email: typeof decoded.email === 'string' ? decoded.email : undefined,
            };
        } catch {
            return null;
        }
    }

    sleep(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }

    errorMessage(error: unknown): string {
        if (error instanceof Error) return error.message;
        return typeof error === 'string' ? error : 'Unknown error';
    }
}

export default new Helpers();
