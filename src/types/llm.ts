/**
 * LLM Service Types
 * Contracts for the text and speech models capabilities call out to
 */

// ============================================
// Provider Configuration
// ============================================

export type LLMProviderType = 'anthropic' | 'google';

export interface LLMProviderConfig {
    provider: LLMProviderType;
    apiKey: string;
    baseUrl?: string;
    defaultModel: string;
    maxRetries: number;
    retryDelayMs: number;
    timeoutMs: number;
}

export interface AnthropicLLMConfig extends LLMProviderConfig {
    provider: 'anthropic';
}

export interface GoogleLLMConfig extends LLMProviderConfig {
    provider: 'google';
}

// ============================================
// Message Types
// ============================================

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: MessageRole;
    content: string;
}

export interface ChatCompletionOptions {
    /**
     * Model to use (overrides default)
     */
    model?: string;

    temperature?: number;

    maxTokens?: number;

    /**
     * Ask for a JSON response body where the provider supports it
     */
    json?: boolean;
}

// ============================================
// Response Types
// ============================================

export interface ChatCompletionResponse {
    content: string;
    model: string;
    finishReason: 'stop' | 'length' | 'content_filter' | 'error' | null;
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

// ============================================
// Model Interfaces
// ============================================

export interface TextModel {
    complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse>;
}

export interface LLMProvider extends TextModel {
    readonly name: LLMProviderType;
}

export interface SpeechVoice {
    name: string;
    speakingRate: number;
    language: string;
}

export interface SynthesizedSpeech {
    audio: Buffer;
    contentType: string;
    extension: string;
}

export interface SpeechModel {
    synthesize(text: string, voice: SpeechVoice): Promise<SynthesizedSpeech>;
}

// ============================================
// Error Types
// ============================================

export class LLMError extends Error {
    constructor(
        message: string,
        public readonly provider: string,
        public readonly code: string,
        public readonly retryable: boolean = false,
        public readonly originalError?: Error
    ) {
        super(message);
        this.name = 'LLMError';
    }
}

export class LLMRateLimitError extends LLMError {
    constructor(provider: string, public readonly retryAfterMs?: number) {
        super('Rate limit exceeded', provider, 'RATE_LIMIT', true);
        this.name = 'LLMRateLimitError';
    }
}

export class LLMContextLengthError extends LLMError {
    constructor(provider: string, maxTokens: number) {
        super(
            `Context length exceeded. Maximum: ${maxTokens} tokens`,
            provider,
            'CONTEXT_LENGTH',
            false
        );
        this.name = 'LLMContextLengthError';
    }
}

export class LLMContentFilterError extends LLMError {
    constructor(provider: string) {
        super(
            'Content filtered by safety system',
            provider,
            'CONTENT_FILTER',
            false
        );
        this.name = 'LLMContentFilterError';
    }
}
