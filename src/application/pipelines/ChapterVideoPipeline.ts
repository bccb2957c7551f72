import { PipelineStep } from './PipelineInfrastructure';
import { StoryStep } from './steps/StoryStep';
import { VoiceoverStep } from './steps/VoiceoverStep';
import { ImageStep } from './steps/ImageStep';
import { RenderStep } from './steps/RenderStep';
import { StoryRepository } from '../../infrastructure/story/StoryRepository';
import { VoiceoverService } from '../services/VoiceoverService';
import { ImageGenerationService } from '../services/ImageGenerationService';
import { VideoCreator } from '../VideoCreator';

export interface PipelineDependencies {
    stories: StoryRepository;
    voiceoverService: VoiceoverService;
    imageGenerationService: ImageGenerationService;
    videoCreator: VideoCreator;
}

export function createChapterPipeline(deps: PipelineDependencies): PipelineStep[] {
    return [
        // 1. Read and split the chapter
        new StoryStep(deps.stories),
        // 2. Narrate every paragraph
        new VoiceoverStep(deps.voiceoverService),
        // 3. Illustrate every paragraph
        new ImageStep(deps.imageGenerationService),
        // 4. Compose and encode
        new RenderStep(deps.videoCreator, deps.stories),
    ];
}
