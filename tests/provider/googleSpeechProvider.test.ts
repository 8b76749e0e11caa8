import { afterEach, describe, expect, it, vi } from 'vitest';
import { GoogleSpeechProvider, pcmToWav } from '../../src/provider/googleSpeechProvider';

const config = {
    provider: 'google' as const,
    apiKey: 'test-key',
    baseUrl: 'http://gemini.test',
    defaultModel: 'tts-test',
    maxRetries: 0,
    retryDelayMs: 0,
    timeoutMs: 1000,
};

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('pcmToWav', () => {
    it('prepends a 44-byte mono 16-bit header', () => {
        const wav = pcmToWav(Buffer.from([1, 2, 3, 4]), 24000);

        expect(wav.length).toBe(48);
        expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
        expect(wav.readUInt32LE(4)).toBe(40);
        expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
        expect(wav.readUInt16LE(22)).toBe(1);
        expect(wav.readUInt32LE(24)).toBe(24000);
        expect(wav.readUInt32LE(28)).toBe(48000);
        expect(wav.readUInt16LE(34)).toBe(16);
        expect(wav.readUInt32LE(40)).toBe(4);
        expect([...wav.subarray(44)]).toEqual([1, 2, 3, 4]);
    });
});

describe('GoogleSpeechProvider', () => {
    it('asks for the voice and wraps the returned samples', async () => {
        const fetchMock = vi.fn(
            async (_url: string, _init?: RequestInit) =>
                new Response(
                    JSON.stringify({
                        candidates: [
                            {
                                content: {
                                    parts: [
                                        {
                                            inlineData: {
                                                mimeType: 'audio/L16',
                                                data: Buffer.from([9, 8]).toString('base64'),
                                            },
                                        },
                                    ],
                                },
                            },
                        ],
                    }),
                    { status: 200 }
                )
        );
        vi.stubGlobal('fetch', fetchMock);

        const speech = await new GoogleSpeechProvider(config).synthesize('Xin chào', {
            name: 'Despina',
            speakingRate: 1.5,
            language: 'vi',
        });

        expect(speech.contentType).toBe('audio/wav');
        expect(speech.audio.length).toBe(46);

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('http://gemini.test/models/tts-test:generateContent?key=test-key');
        const body = JSON.parse(String(init?.body));
        expect(body.contents[0].parts[0].text).toBe(
            'Read the following at 1.5x normal speed: Xin chào'
        );
        expect(body.generationConfig.speechConfig.voiceConfig.prebuiltVoiceConfig.voiceName).toBe(
            'Despina'
        );
    });

    it('fails without retrying on a client error', async () => {
        const fetchMock = vi.fn(
            async () =>
                new Response(JSON.stringify({ error: { message: 'bad voice' } }), { status: 400 })
        );
        vi.stubGlobal('fetch', fetchMock);

        await expect(
            new GoogleSpeechProvider(config).synthesize('x', {
                name: 'Nope',
                speakingRate: 1,
                language: 'vi',
            })
        ).rejects.toThrow('bad voice');
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });
});
