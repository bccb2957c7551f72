import { ImageGenerationService } from './services/ImageGenerationService';
import { StoryRepository } from '../infrastructure/story/StoryRepository';
import { NotFoundError } from '../domain/errors';
import { splitIntoParagraphs } from '../domain/services/StoryText';

/**
 * Replaces the image of a single paragraph without touching the rest of the chapter.
 */
export class ImageRegenerator {
    constructor(
        private readonly stories: StoryRepository,
        private readonly imageGenerationService: ImageGenerationService
    ) { }

    /**
     * @throws NotFoundError if the chapter has no paragraph at that index
     */
    async regenerateImage(chapterNumber: number, index: number): Promise<string> {
        const text = await this.stories.readChapter(chapterNumber);
        const paragraphs = splitIntoParagraphs(text);

        if (!Number.isInteger(index) || index < 0 || index >= paragraphs.length) {
            throw new NotFoundError(
                `Paragraph ${index} not found in chapter ${chapterNumber} (${paragraphs.length} paragraphs)`
            );
        }

        const imagePath = await this.imageGenerationService.regenerate(chapterNumber, paragraphs[index], index);
        console.log(`\n✅ Image ${index} of chapter ${chapterNumber} written to ${imagePath}`);
        return imagePath;
    }
}
