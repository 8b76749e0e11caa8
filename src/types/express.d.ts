// Request fields attached by requestId and auth middleware
export {};

declare global {
    namespace Express {
        interface Request {
            id?: string;
            user?: {
                id: string;
                email?: string;
            };
        }
    }
}
