import axios from 'axios';
import { ITTSClient, TTSResult, TTSOptions } from '../../domain/ports/ITTSClient';

/**
 * ElevenLabs text-to-speech client.
 */
export class ElevenLabsTTSClient implements ITTSClient {
    private readonly apiKey: string;
    private readonly voiceId: string;
    private readonly modelId: string;
    private readonly baseUrl: string;

    constructor(
        apiKey: string,
        voiceId: string,
        modelId: string = 'eleven_multilingual_v2',
        baseUrl: string = 'https://api.elevenlabs.io'
    ) {
        if (!apiKey) {
            throw new Error('ElevenLabs API key is required');
        }
        if (!voiceId) {
            throw new Error('ElevenLabs voice ID is required');
        }
        this.apiKey = apiKey;
        this.voiceId = voiceId;
        this.modelId = modelId;
        this.baseUrl = baseUrl;
    }

    /**
     * Synthesizes text to mp3 audio.
     */
    async synthesize(text: string, options?: TTSOptions): Promise<TTSResult> {
        if (!text || !text.trim()) {
            throw new Error('Text is required for TTS');
        }

        const voiceId = options?.voiceId || this.voiceId;

        try {
            const response = await axios.post<ArrayBuffer>(
                `${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(voiceId)}`,
                {
                    text: text.trim(),
                    model_id: options?.modelId || this.modelId,
                },
                {
                    headers: {
                        'xi-api-key': this.apiKey,
                        'Content-Type': 'application/json',
                        Accept: 'audio/mpeg',
                    },
                    responseType: 'arraybuffer',
                }
            );

            const audioData = Buffer.from(response.data);
            if (audioData.length === 0) {
                throw new Error('TTS synthesis failed: empty audio response');
            }

            return { audioData, format: 'mp3' };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const message = extractErrorMessage(error.response?.data) || error.message;
                throw new Error(`TTS synthesis failed: ${message}`);
            }
            throw error;
        }
    }
}

/**
 * Pulls the provider's message out of an arraybuffer error body.
 * ElevenLabs answers `{ detail: { message } }` or `{ detail: "..." }`.
 */
function extractErrorMessage(data: unknown): string | undefined {
    if (!(data instanceof ArrayBuffer) && !Buffer.isBuffer(data)) {
        return undefined;
    }

    try {
        const bytes = Buffer.isBuffer(data) ? data : Buffer.from(data);
        const parsed: unknown = JSON.parse(bytes.toString('utf-8'));
        if (typeof parsed !== 'object' || parsed === null || !('detail' in parsed)) {
            return undefined;
        }
        const detail = parsed.detail;
        if (typeof detail === 'string') {
            return detail;
        }
        if (typeof detail === 'object' && detail !== null && 'message' in detail && typeof detail.message === 'string') {
            return detail.message;
        }
    } catch {
        // Not JSON; the caller falls back to the transport message
        return undefined;
    }
    return undefined;
}
