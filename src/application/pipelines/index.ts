export { PipelineStep, ChapterContext, createChapterContext, executePipeline } from './PipelineInfrastructure';
export { createChapterPipeline, PipelineDependencies } from './ChapterVideoPipeline';
export { StoryStep } from './steps/StoryStep';
export { VoiceoverStep } from './steps/VoiceoverStep';
export { ImageStep } from './steps/ImageStep';
export { RenderStep } from './steps/RenderStep';
