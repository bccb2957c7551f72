import axios from 'axios';
import {
    IImageClient,
    ImageGenerationResult,
    ImageGenerationOptions,
} from '../../domain/ports/IImageClient';

interface ImagesResponse {
    data?: Array<{ url?: string; b64_json?: string; revised_prompt?: string }>;
}

/**
 * OpenAI image generation client (DALL-E 3 by default).
 */
export class OpenAIImageClient implements IImageClient {
    private readonly apiKey: string;
    private readonly model: string;
    private readonly baseUrl: string;

    constructor(apiKey: string, model: string = 'dall-e-3', baseUrl: string = 'https://api.openai.com') {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl;
    }

    /**
     * Generates an image from a text prompt.
     */
    async generateImage(
        prompt: string,
        options?: ImageGenerationOptions
    ): Promise<ImageGenerationResult> {
        if (!prompt || !prompt.trim()) {
            throw new Error('Prompt is required for image generation');
        }

        try {
            const response = await axios.post<ImagesResponse>(
                `${this.baseUrl}/v1/images/generations`,
                {
                    model: this.model,
                    prompt,
                    size: options?.size || '1792x1024',
                    quality: options?.quality || 'standard',
                    n: 1,
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                }
            );

            const imageData = response.data.data?.[0];
            if (imageData?.url) {
                return { imageUrl: imageData.url, revisedPrompt: imageData.revised_prompt };
            }
            if (imageData?.b64_json) {
                return {
                    imageUrl: `data:image/png;base64,${imageData.b64_json}`,
                    revisedPrompt: imageData.revised_prompt,
                };
            }
            throw new Error('Image generation failed: no image in response');
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const data: unknown = error.response?.data;
                const message = hasErrorMessage(data) ? data.error.message : error.message;
                throw new Error(`Image generation failed: ${message}`);
            }
            throw error;
        }
    }
}

function hasErrorMessage(data: unknown): data is { error: { message: string } } {
    if (typeof data !== 'object' || data === null || !('error' in data)) {
        return false;
    }
    const inner = data.error;
    return typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string';
}
