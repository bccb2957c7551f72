import { PipelineStep, ChapterContext } from '../PipelineInfrastructure';
import { StoryRepository } from '../../../infrastructure/story/StoryRepository';
import { splitIntoParagraphs } from '../../../domain/services/StoryText';

export class StoryStep implements PipelineStep {
    readonly name = 'Story';

    constructor(private readonly stories: StoryRepository) { }

    async execute(context: ChapterContext): Promise<ChapterContext> {
        const text = await this.stories.readChapter(context.chapterNumber);
        const paragraphs = splitIntoParagraphs(text);

        console.log(`[Chapter ${context.chapterNumber}] Found ${paragraphs.length} paragraphs`);

        return { ...context, paragraphs };
    }
}
