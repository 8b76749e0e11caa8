/**
 * Base LLM Provider
 * Abstract class with common functionality for all LLM providers
 */

import type { z } from 'zod';
import {
    LLMProviderConfig,
    LLMProviderType,
    ChatCompletionOptions,
    LLMError,
    LLMRateLimitError,
} from '../types/llm';
import { createLogger } from '../lib/logger';

const logger = createLogger('llm-provider');

export abstract class BaseLLMProvider {
    abstract readonly name: LLMProviderType;

    constructor(protected readonly config: LLMProviderConfig) {}

    /**
     * Execute with retry logic and exponential backoff
     */
    protected async withRetry<T>(
        operation: () => Promise<T>,
        context: string
    ): Promise<T> {
        let lastError: Error | undefined;

        for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
            try {
                return await operation();
            } catch (error) {
                lastError = error instanceof Error ? error : new Error(String(error));

                // Don't retry non-retryable errors
                if (error instanceof LLMError && !error.retryable) {
                    throw error;
                }

                // Last attempt - throw
                if (attempt === this.config.maxRetries) {
                    break;
                }

                // Honour retry-after, otherwise exponential backoff + jitter
                const delay =
                    error instanceof LLMRateLimitError && error.retryAfterMs
                        ? error.retryAfterMs
                        : this.calculateBackoff(attempt);

                logger.warn(
                    {
                        provider: this.name,
                        context,
                        attempt: attempt + 1,
                        maxAttempts: this.config.maxRetries + 1,
                        delay,
                        error: lastError.message,
                    },
                    'Provider call failed, retrying'
                );

                await this.sleep(delay);
            }
        }

        throw new LLMError(
            `Failed after ${this.config.maxRetries + 1} attempts: ${
                lastError?.message
            }`,
            this.name,
            'MAX_RETRIES_EXCEEDED',
            false,
            lastError
        );
    }

    /**
     * Calculate exponential backoff with jitter
     */
    protected calculateBackoff(attempt: number): number {
        const baseDelay = this.config.retryDelayMs;
        const exponentialDelay = baseDelay * Math.pow(2, attempt);
        const jitter = Math.random() * baseDelay;
        return Math.min(exponentialDelay + jitter, 60000); // Cap at 60s
    }

    protected sleep(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }

    /**
     * Fetch with timeout wrapper
     */
    protected async fetchWithTimeout(
        url: string,
        options: RequestInit
    ): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(
            () => controller.abort(),
            this.config.timeoutMs
        );

        try {
            return await fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new LLMError(
                    'Request timed out',
                    this.name,
                    'TIMEOUT',
                    true
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Read and validate a JSON response body
     */
    protected async readJson<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
        const body: unknown = await response.json();
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            throw new LLMError(
                'Unexpected response shape',
                this.name,
                'BAD_RESPONSE',
                false
            );
        }
        return parsed.data;
    }

    /**
     * Best-effort error message from a failed response
     */
    protected async readErrorBody(
        response: Response
    ): Promise<{ message: string; type: string }> {
        const fallback = { message: `${this.name} error: ${response.status}`, type: '' };
        try {
            const body: unknown = await response.json();
            if (typeof body !== 'object' || body === null || !('error' in body)) {
                return fallback;
            }
            const { error } = body;
            if (typeof error !== 'object' || error === null) return fallback;
            return {
                message:
                    'message' in error && typeof error.message === 'string'
                        ? error.message
                        : fallback.message,
                type: 'type' in error && typeof error.type === 'string' ? error.type : '',
            };
        } catch {
            return fallback;
        }
    }

    /**
     * Get default model
     */
    protected getModel(options?: ChatCompletionOptions): string {
        return options?.model || this.config.defaultModel;
    }
}
