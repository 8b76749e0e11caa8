export interface APIErrorMeta {
    requestId?: string;
    timestamp?: string;
    [key: string]: unknown;
}

export interface APIErrorOptions {
    code: number;
    message: string;
    errorCode?: string;
    data?: unknown;
    meta?: APIErrorMeta;
}

export class APIError extends Error {
    public readonly statusCode: number;
    public readonly errorCode: string;
    public readonly data?: unknown;
    public readonly meta: APIErrorMeta;

    constructor(options: APIErrorOptions) {
        super(options.message);
        this.name = 'APIError';
        this.statusCode = options.code;
        this.errorCode = options.errorCode || this.getDefaultErrorCode(options.code);
        this.data = options.data;

        this.meta = {
            timestamp: new Date().toISOString(),
            ...options.meta,
        };

        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, APIError);
        }
    }

    private getDefaultErrorCode(statusCode: number): string {
        const errorCodeMap: Record<number, string> = {
            400: 'BAD_REQUEST',
            401: 'UNAUTHORIZED',
            402: 'PAYMENT_REQUIRED',
            403: 'FORBIDDEN',
            404: 'NOT_FOUND',
            409: 'CONFLICT',
            422: 'UNPROCESSABLE_ENTITY',
            429: 'TOO_MANY_REQUESTS',
            500: 'INTERNAL_ERROR',
            502: 'BAD_GATEWAY',
            503: 'SERVICE_UNAVAILABLE',
        };

        return errorCodeMap[statusCode] || 'ERROR';
    }
}
