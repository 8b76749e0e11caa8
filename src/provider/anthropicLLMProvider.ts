/**
 * Anthropic LLM Provider
 * Supports the Claude model family through the Messages API
 */

import { z } from 'zod';
import { BaseLLMProvider } from './baseLLMProvider';
import {
    AnthropicLLMConfig,
    LLMProvider,
    ChatMessage,
    ChatCompletionOptions,
    ChatCompletionResponse,
    LLMError,
    LLMRateLimitError,
    LLMContextLengthError,
} from '../types/llm';

interface AnthropicMessage {
    role: 'user' | 'assistant';
    content: string;
}

const anthropicResponseSchema = z.object({
    model: z.string(),
    content: z.array(
        z.object({
            type: z.string(),
            text: z.string().optional(),
        })
    ),
    stop_reason: z.string().nullable(),
    usage: z
        .object({
            input_tokens: z.number(),
            output_tokens: z.number(),
        })
        .optional(),
});

type AnthropicResponse = z.infer<typeof anthropicResponseSchema>;

export class AnthropicLLMProvider extends BaseLLMProvider implements LLMProvider {
    readonly name = 'anthropic' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly apiVersion = '2023-06-01';

    constructor(config: AnthropicLLMConfig) {
        super(config);
        this.apiKey = config.apiKey;
        this.baseUrl = config.baseUrl || 'https://api.anthropic.com/v1';
    }

    /**
     * Generate a chat completion
     */
    async complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse> {
        return this.withRetry(async () => {
            const { systemPrompt, formattedMessages } =
                this.formatMessages(messages);

            const response = await this.fetchWithTimeout(
                `${this.baseUrl}/messages`,
                {
                    method: 'POST',
                    headers: this.getHeaders(),
                    body: JSON.stringify(
                        this.buildRequestBody(
                            systemPrompt,
                            formattedMessages,
                            options
                        )
                    ),
                }
            );

            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            const data = await this.readJson(response, anthropicResponseSchema);

            return this.parseResponse(data);
        }, 'complete');
    }

    /**
     * Build request headers
     */
    private getHeaders(): Record<string, string> {
        return {
            'Content-Type': 'application/json',
            'x-api-key': this.apiKey,
            'anthropic-version': this.apiVersion,
        };
    }

    /**
     * Format messages for Anthropic API
     * Anthropic handles system prompts separately
     */
    private formatMessages(messages: ChatMessage[]): {
        systemPrompt: string | undefined;
        formattedMessages: AnthropicMessage[];
    } {
        let systemPrompt: string | undefined;
        const formattedMessages: AnthropicMessage[] = [];

        for (const message of messages) {
            if (message.role === 'system') {
                // Concatenate system messages
                systemPrompt = systemPrompt
                    ? `${systemPrompt}\n\n${message.content}`
                    : message.content;
            } else {
                formattedMessages.push({
                    role: message.role,
                    content: message.content,
                });
            }
        }

        return { systemPrompt, formattedMessages };
    }

    /**
     * Build request body
     */
    private buildRequestBody(
        systemPrompt: string | undefined,
        messages: AnthropicMessage[],
        options?: ChatCompletionOptions
    ): Record<string, unknown> {
        const body: Record<string, unknown> = {
            model: this.getModel(options),
            messages,
            max_tokens: options?.maxTokens || 8192,
        };

        if (systemPrompt) {
            body.system = systemPrompt;
        }

        if (options?.temperature !== undefined) {
            body.temperature = options.temperature;
        }

        return body;
    }

    /**
     * Parse Anthropic response
     */
    private parseResponse(data: AnthropicResponse): ChatCompletionResponse {
        const content = data.content
            .filter((block) => block.type === 'text')
            .map((block) => block.text ?? '')
            .join('');

        return {
            content,
            model: data.model,
            finishReason: this.mapFinishReason(data.stop_reason),
            usage: {
                promptTokens: data.usage?.input_tokens || 0,
                completionTokens: data.usage?.output_tokens || 0,
                totalTokens:
                    (data.usage?.input_tokens || 0) +
                    (data.usage?.output_tokens || 0),
            },
        };
    }

    /**
     * Map Anthropic stop reason to our format
     */
    private mapFinishReason(
        reason: string | null
    ): 'stop' | 'length' | 'content_filter' | null {
        switch (reason) {
            case 'end_turn':
            case 'stop_sequence':
                return 'stop';
            case 'max_tokens':
                return 'length';
            default:
                return null;
        }
    }

    /**
     * Handle error responses
     */
    private async handleErrorResponse(response: Response): Promise<never> {
        const { message, type } = await this.readErrorBody(response);

        // Rate limiting
        if (response.status === 429) {
            const retryAfter = response.headers.get('retry-after');
            const retryAfterMs = retryAfter
                ? parseInt(retryAfter, 10) * 1000
                : undefined;
            throw new LLMRateLimitError(this.name, retryAfterMs);
        }

        // Context length
        if (type === 'invalid_request_error' && message.includes('token')) {
            throw new LLMContextLengthError(this.name, 0);
        }

        // Auth errors
        if (response.status === 401 || response.status === 403) {
            throw new LLMError(
                `Authentication error: ${message}`,
                this.name,
                'AUTH_ERROR',
                false
            );
        }

        throw new LLMError(
            message,
            this.name,
            `HTTP_${response.status}`,
            response.status >= 500
        );
    }
}
