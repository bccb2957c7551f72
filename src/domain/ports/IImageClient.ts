/**
 * ImageGenerationResult from an image generation request.
 */
export interface ImageGenerationResult {
    /** URL to the generated image (http(s) or data URL) */
    imageUrl: string;
    /** Revised prompt if the AI modified it */
    revisedPrompt?: string;
}

export const IMAGE_SIZES = ['1024x1024', '1792x1024', '1024x1792'] as const;
export const IMAGE_QUALITIES = ['standard', 'hd'] as const;

export type ImageSize = typeof IMAGE_SIZES[number];
export type ImageQuality = typeof IMAGE_QUALITIES[number];

export function isImageSize(value: string): value is ImageSize {
    return IMAGE_SIZES.some((size) => size === value);
}

export function isImageQuality(value: string): value is ImageQuality {
    return IMAGE_QUALITIES.some((quality) => quality === value);
}

/**
 * ImageGenerationOptions for customizing generation.
 */
export interface ImageGenerationOptions {
    /** Image size (default: 1792x1024) */
    size?: ImageSize;
    /** Image quality (default: standard) */
    quality?: ImageQuality;
}

/**
 * IImageClient - Port for image generation services.
 * Implementations: OpenAIImageClient
 */
export interface IImageClient {
    /**
     * Generates an image from a text prompt.
     * @param prompt The image generation prompt
     * @param options Optional generation options
     * @returns Generated image URL
     */
    generateImage(
        prompt: string,
        options?: ImageGenerationOptions
    ): Promise<ImageGenerationResult>;
}
