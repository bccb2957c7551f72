import { PipelineStep, ChapterContext, requireFromContext } from '../PipelineInfrastructure';
import { ImageGenerationService } from '../../services/ImageGenerationService';

export class ImageStep implements PipelineStep {
    readonly name = 'Images';

    constructor(private readonly imageService: ImageGenerationService) { }

    async execute(context: ChapterContext): Promise<ChapterContext> {
        const paragraphs = requireFromContext(context, 'paragraphs', this.name);
        const imagePaths = await this.imageService.batchGenerate(context.chapterNumber, paragraphs);
        return { ...context, imagePaths };
    }
}
