/**
 * Google Gemini speech provider
 * Text-to-speech through the Gemini TTS models
 */

import { z } from 'zod';
import { BaseLLMProvider } from './baseLLMProvider';
import { GEMINI_BASE_URL } from './googleGeminiLLMProvider';
import {
    GoogleLLMConfig,
    LLMError,
    LLMRateLimitError,
    SpeechModel,
    SpeechVoice,
    SynthesizedSpeech,
} from '../types/llm';

// Gemini TTS answers with raw 16-bit little-endian mono PCM
const SAMPLE_RATE = 24000;
const CHANNELS = 1;
const BITS_PER_SAMPLE = 16;

const speechResponseSchema = z.object({
    candidates: z
        .array(
            z.object({
                content: z.object({
                    parts: z.array(
                        z.object({
                            inlineData: z
                                .object({
                                    mimeType: z.string().optional(),
                                    data: z.string(),
                                })
                                .optional(),
                        })
                    ),
                }),
            })
        )
        .min(1),
});

/**
 * Wraps PCM samples in a RIFF/WAVE header
 */
export function pcmToWav(pcm: Buffer, sampleRate = SAMPLE_RATE): Buffer {
    const blockAlign = (CHANNELS * BITS_PER_SAMPLE) / 8;
    const header = Buffer.alloc(44);

    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(36 + pcm.length, 4);
    header.write('WAVE', 8, 'ascii');
    header.write('fmt ', 12, 'ascii');
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(1, 20);
    header.writeUInt16LE(CHANNELS, 22);
    header.writeUInt32LE(sampleRate, 24);
    header.writeUInt32LE(sampleRate * blockAlign, 28);
    header.writeUInt16LE(blockAlign, 32);
    header.writeUInt16LE(BITS_PER_SAMPLE, 34);
    header.write('data', 36, 'ascii');
    header.writeUInt32LE(pcm.length, 40);

    return Buffer.concat([header, pcm]);
}

export class GoogleSpeechProvider extends BaseLLMProvider implements SpeechModel {
    readonly name = 'google' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(config: GoogleLLMConfig) {
        super(config);
        this.apiKey = config.apiKey;
        this.baseUrl = config.baseUrl || GEMINI_BASE_URL;
    }

    async synthesize(text: string, voice: SpeechVoice): Promise<SynthesizedSpeech> {
        return this.withRetry(async () => {
            const model = this.config.defaultModel;
            // Gemini TTS takes pace as a natural-language style hint
            const prompt =
                voice.speakingRate === 1
                    ? text
                    : `Read the following at ${voice.speakingRate}x normal speed: ${text}`;

            const response = await this.fetchWithTimeout(
                `${this.baseUrl}/models/${model}:generateContent?key=${this.apiKey}`,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify({
                        contents: [{ role: 'user', parts: [{ text: prompt }] }],
                        generationConfig: {
                            responseModalities: ['AUDIO'],
                            speechConfig: {
                                languageCode: voice.language,
                                voiceConfig: {
                                    prebuiltVoiceConfig: { voiceName: voice.name },
                                },
                            },
                        },
                    }),
                }
            );

            if (!response.ok) {
                const { message } = await this.readErrorBody(response);
                if (response.status === 429) throw new LLMRateLimitError(this.name);
                throw new LLMError(
                    message,
                    this.name,
                    `HTTP_${response.status}`,
                    response.status >= 500
                );
            }

            const data = await this.readJson(response, speechResponseSchema);
            const inline = data.candidates[0].content.parts.find((part) => part.inlineData)
                ?.inlineData;

            if (!inline) {
                throw new LLMError('No audio in response', this.name, 'NO_AUDIO', true);
            }

            return {
                audio: pcmToWav(Buffer.from(inline.data, 'base64')),
                contentType: 'audio/wav',
                extension: 'wav',
            };
        }, 'synthesize');
    }
}
