import path from 'path';
import { IImageClient, ImageGenerationOptions } from '../../domain/ports/IImageClient';
import { LocalMediaStore } from '../../infrastructure/storage/LocalMediaStore';
import { StoryRepository } from '../../infrastructure/story/StoryRepository';
import { MissingBasePromptError } from '../../domain/errors';
import { buildImagePrompt } from '../../domain/services/StoryText';

/**
 * ImageGenerationService illustrates paragraphs into image_{index}.png files,
 * using the chapter's base prompt as shared style.
 */
export class ImageGenerationService {
    constructor(
        private readonly imageClient: IImageClient,
        private readonly store: LocalMediaStore,
        private readonly stories: StoryRepository,
        private readonly imagesDir: string,
        private readonly options: ImageGenerationOptions = {}
    ) { }

    getImagePath(index: number): string {
        return path.join(this.imagesDir, `image_${index}.png`);
    }

    /**
     * Reads the base prompt of a chapter.
     * @throws MissingBasePromptError if the chapter has none
     */
    async getBasePrompt(chapterNumber: number): Promise<string> {
        const promptPath = this.stories.getBasePromptPath(chapterNumber);
        console.log(`[ImageGen] Looking for base prompt at: ${promptPath}`);

        const basePrompt = await this.stories.readBasePrompt(chapterNumber);
        if (basePrompt === null) {
            throw new MissingBasePromptError(chapterNumber, promptPath);
        }

        console.log(`[ImageGen] Found base prompt (${basePrompt.length} chars)`);
        return basePrompt;
    }

    /**
     * Generates the image for one paragraph of a chapter.
     */
    async generate(chapterNumber: number, text: string, index: number): Promise<string> {
        const basePrompt = await this.getBasePrompt(chapterNumber);
        return this.generateWithBasePrompt(basePrompt, text, index);
    }

    /**
     * Generates images for all paragraphs one after another, in order.
     */
    async batchGenerate(chapterNumber: number, paragraphs: readonly string[]): Promise<string[]> {
        console.log('\n🎨 Generating visuals...');
        const basePrompt = await this.getBasePrompt(chapterNumber);
        const paths: string[] = [];

        for (const [index, text] of paragraphs.entries()) {
            console.log(`[ImageGen] (${index + 1}/${paragraphs.length}) Generating image ${index}`);
            paths.push(await this.generateWithBasePrompt(basePrompt, text, index));
        }

        return paths;
    }

    /**
     * Replaces the image of one paragraph.
     */
    async regenerate(chapterNumber: number, text: string, index: number): Promise<string> {
        console.log('\n🎨 Regenerating image...');
        return this.generate(chapterNumber, text, index);
    }

    private async generateWithBasePrompt(basePrompt: string, text: string, index: number): Promise<string> {
        const prompt = buildImagePrompt(basePrompt, text);
        console.log(`[ImageGen] Prompt for image ${index}:\n---\n${prompt}\n---`);

        const result = await this.imageClient.generateImage(prompt, this.options);
        return this.store.saveFromUrl(result.imageUrl, this.getImagePath(index));
    }
}
