/**
 * LLM Provider Factory
 * Creates the configured text and speech providers
 */

import { llmConfig } from '../config/llm';
import { LLMError, LLMProvider, LLMProviderConfig, SpeechModel } from '../types/llm';
import { AnthropicLLMProvider } from './anthropicLLMProvider';
import { GoogleLLMProvider } from './googleGeminiLLMProvider';
import { GoogleSpeechProvider } from './googleSpeechProvider';

/**
 * Factory to create LLM providers
 */
export class LLMProviderFactory {
    private static providers: Map<string, LLMProvider> = new Map();
    private static speech: SpeechModel | null = null;

    /**
     * Create a provider instance from config
     */
    static create(config: LLMProviderConfig): LLMProvider {
        if (!config.apiKey) {
            throw new LLMError(
                `API key is required for the ${config.provider} provider`,
                'factory',
                'MISSING_API_KEY',
                false
            );
        }

        switch (config.provider) {
            case 'anthropic':
                return new AnthropicLLMProvider({ ...config, provider: 'anthropic' });

            case 'google':
                return new GoogleLLMProvider({ ...config, provider: 'google' });
        }
    }

    /**
     * Get or create a cached provider instance
     */
    static getOrCreate(config: LLMProviderConfig): LLMProvider {
        const cacheKey = `${config.provider}:${config.defaultModel}`;

        const cached = this.providers.get(cacheKey);
        if (cached) return cached;

        const provider = this.create(config);
        this.providers.set(cacheKey, provider);
        return provider;
    }

    /**
     * Text provider selected by LLM_PROVIDER
     */
    static createDefault(): LLMProvider {
        return this.getOrCreate(
            llmConfig.provider === 'anthropic' ? llmConfig.anthropic : llmConfig.google
        );
    }

    static createSpeech(): SpeechModel {
        if (!this.speech) {
            if (!llmConfig.speech.apiKey) {
                throw new LLMError(
                    'GEMINI_API_KEY is required for speech synthesis',
                    'factory',
                    'MISSING_API_KEY',
                    false
                );
            }
            this.speech = new GoogleSpeechProvider(llmConfig.speech);
        }
        return this.speech;
    }
}
