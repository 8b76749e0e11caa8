// lib/jobs/retry.ts
import Helpers from '../helpers';

export class UnitTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms`);
        this.name = 'UnitTimeoutError';
    }
}

export interface RetryPolicy {
    attempts: number;
    baseDelayMs: number;
    /** Per-attempt limit; 0 disables it */
    timeoutMs: number;
}

export interface RetryHooks {
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay before the attempt following `attempt` (1-based):
 * base, 2 * base, 4 * base, ...
 */
export const backoffDelay = (baseDelayMs: number, attempt: number): number =>
    baseDelayMs * Math.pow(2, attempt - 1);

/**
 * Races `operation` against a timer. The operation is not aborted; its
 * eventual settlement is ignored.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) return operation;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new UnitTimeoutError(timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Execute with bounded attempts and exponential backoff. The last error is
 * rethrown unchanged once attempts run out.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    hooks: RetryHooks = {}
): Promise<T> {
    const sleep = hooks.sleep ?? Helpers.sleep;
    const attempts = Math.max(1, policy.attempts);

    for (let attempt = 1; ; attempt++) {
        try {
            return await withTimeout(operation(attempt), policy.timeoutMs);
        } catch (error) {
            if (attempt >= attempts) throw error;

            const delay = backoffDelay(policy.baseDelayMs, attempt);
            hooks.onRetry?.(attempt, delay, error);
            await sleep(delay);
        }
    }
}
