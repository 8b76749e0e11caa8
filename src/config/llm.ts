// config/llm.ts
import env from './env';
import type { AnthropicLLMConfig, GoogleLLMConfig } from '../types/llm';

export const llmConfig = {
    provider: env.LLM_PROVIDER,

    google: {
        provider: 'google',
        apiKey: env.GEMINI_API_KEY,
        defaultModel: env.GEMINI_MODEL,
        maxRetries: 3,
        retryDelayMs: 1000,
        timeoutMs: 120000,
    } satisfies GoogleLLMConfig,

    anthropic: {
        provider: 'anthropic',
        apiKey: env.ANTHROPIC_API_KEY,
        defaultModel: env.ANTHROPIC_MODEL,
        maxRetries: 3,
        retryDelayMs: 1000,
        timeoutMs: 120000,
    } satisfies AnthropicLLMConfig,

    speech: {
        provider: 'google',
        apiKey: env.GEMINI_API_KEY,
        defaultModel: env.GEMINI_TTS_MODEL,
        maxRetries: 2,
        retryDelayMs: 2000,
        timeoutMs: 60000,
    } satisfies GoogleLLMConfig,
};
