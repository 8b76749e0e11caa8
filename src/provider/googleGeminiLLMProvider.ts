/**
 * Google Gemini LLM Provider
 * Supports Gemini Pro, Gemini Flash, etc.
 */

import { z } from 'zod';
import { BaseLLMProvider } from './baseLLMProvider';
import {
    GoogleLLMConfig,
    LLMProvider,
    ChatMessage,
    ChatCompletionOptions,
    ChatCompletionResponse,
    LLMError,
    LLMRateLimitError,
    LLMContentFilterError,
} from '../types/llm';

interface GeminiContent {
    role: 'user' | 'model';
    parts: Array<{ text: string }>;
}

const geminiResponseSchema = z.object({
    candidates: z
        .array(
            z.object({
                content: z
                    .object({
                        parts: z.array(z.object({ text: z.string().optional() })).optional(),
                    })
                    .optional(),
                finishReason: z.string().optional(),
            })
        )
        .optional(),
    usageMetadata: z
        .object({
            promptTokenCount: z.number().optional(),
            candidatesTokenCount: z.number().optional(),
            totalTokenCount: z.number().optional(),
        })
        .optional(),
});

type GeminiResponse = z.infer<typeof geminiResponseSchema>;

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export class GoogleLLMProvider extends BaseLLMProvider implements LLMProvider {
    readonly name = 'google' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(config: GoogleLLMConfig) {
        super(config);
        this.apiKey = config.apiKey;
        this.baseUrl = config.baseUrl || GEMINI_BASE_URL;
    }

    /**
     * Generate a chat completion
     */
    async complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse> {
        return this.withRetry(async () => {
            const { systemInstruction, contents } =
                this.formatMessages(messages);
            const model = this.getModel(options);

            const response = await this.fetchWithTimeout(
                `${this.baseUrl}/models/${model}:generateContent?key=${this.apiKey}`,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(
                        this.buildRequestBody(
                            systemInstruction,
                            contents,
                            options
                        )
                    ),
                }
            );

            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            const data = await this.readJson(response, geminiResponseSchema);

            return this.parseResponse(data, model);
        }, 'complete');
    }

    /**
     * Format messages for Gemini API
     */
    private formatMessages(messages: ChatMessage[]): {
        systemInstruction: string | undefined;
        contents: GeminiContent[];
    } {
        let systemInstruction: string | undefined;
        const contents: GeminiContent[] = [];

        for (const message of messages) {
            if (message.role === 'system') {
                systemInstruction = systemInstruction
                    ? `${systemInstruction}\n\n${message.content}`
                    : message.content;
            } else {
                contents.push({
                    role: message.role === 'assistant' ? 'model' : 'user',
                    parts: [{ text: message.content }],
                });
            }
        }

        return { systemInstruction, contents };
    }

    /**
     * Build request body
     */
    private buildRequestBody(
        systemInstruction: string | undefined,
        contents: GeminiContent[],
        options?: ChatCompletionOptions
    ): Record<string, unknown> {
        const body: Record<string, unknown> = { contents };

        if (systemInstruction) {
            body.systemInstruction = {
                parts: [{ text: systemInstruction }],
            };
        }

        const generationConfig: Record<string, unknown> = {};

        if (options?.temperature !== undefined) {
            generationConfig.temperature = options.temperature;
        }

        if (options?.maxTokens !== undefined) {
            generationConfig.maxOutputTokens = options.maxTokens;
        }

        if (options?.json) {
            generationConfig.responseMimeType = 'application/json';
        }

        if (Object.keys(generationConfig).length > 0) {
            body.generationConfig = generationConfig;
        }

        return body;
    }

    /**
     * Parse Gemini response
     */
    private parseResponse(
        data: GeminiResponse,
        model: string
    ): ChatCompletionResponse {
        const candidate = data.candidates?.[0];

        if (!candidate) {
            throw new LLMError(
                'No response candidates',
                this.name,
                'NO_CANDIDATES',
                true
            );
        }

        const content =
            candidate.content?.parts?.map((part) => part.text ?? '').join('') || '';

        return {
            content,
            model,
            finishReason: this.mapFinishReason(candidate.finishReason ?? ''),
            usage: {
                promptTokens: data.usageMetadata?.promptTokenCount || 0,
                completionTokens: data.usageMetadata?.candidatesTokenCount || 0,
                totalTokens: data.usageMetadata?.totalTokenCount || 0,
            },
        };
    }

    /**
     * Map Gemini finish reason to our format
     */
    private mapFinishReason(
        reason: string
    ): 'stop' | 'length' | 'content_filter' | null {
        switch (reason) {
            case 'STOP':
                return 'stop';
            case 'MAX_TOKENS':
                return 'length';
            case 'SAFETY':
            case 'RECITATION':
                return 'content_filter';
            default:
                return null;
        }
    }

    /**
     * Handle error responses
     */
    private async handleErrorResponse(response: Response): Promise<never> {
        const { message } = await this.readErrorBody(response);

        // Rate limiting
        if (response.status === 429) {
            throw new LLMRateLimitError(this.name);
        }

        // Content filter
        if (message.includes('SAFETY') || message.includes('blocked')) {
            throw new LLMContentFilterError(this.name);
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
