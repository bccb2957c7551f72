import { PipelineStep, ChapterContext, requireFromContext } from '../PipelineInfrastructure';
import { VideoCreator } from '../../VideoCreator';
import { StoryRepository } from '../../../infrastructure/story/StoryRepository';

export class RenderStep implements PipelineStep {
    readonly name = 'Render';

    constructor(
        private readonly videoCreator: VideoCreator,
        private readonly stories: StoryRepository
    ) { }

    async execute(context: ChapterContext): Promise<ChapterContext> {
        const imagePaths = requireFromContext(context, 'imagePaths', this.name);
        const audioPaths = requireFromContext(context, 'audioPaths', this.name);
        const outputName = context.outputName ?? this.stories.getOutputFilename(context.chapterNumber);

        const videoPath = await this.videoCreator.createVideo(imagePaths, audioPaths, outputName);

        return { ...context, outputName, videoPath };
    }
}
