import { Config } from '../config';
import { ChapterVideoOrchestrator } from '../application/ChapterVideoOrchestrator';
import { ImageRegenerator } from '../application/ImageRegenerator';
import { MediaCombiner } from '../application/MediaCombiner';
import { VideoCreator } from '../application/VideoCreator';
import { ClipSynthesizer } from '../application/services/ClipSynthesizer';
import { TimelineComposer } from '../application/services/TimelineComposer';
import { VoiceoverService } from '../application/services/VoiceoverService';
import { ImageGenerationService } from '../application/services/ImageGenerationService';

// Infrastructure imports
import { ElevenLabsTTSClient } from '../infrastructure/tts/ElevenLabsTTSClient';
import { OpenAIImageClient } from '../infrastructure/images/OpenAIImageClient';
import { isImageQuality, isImageSize } from '../domain/ports/IImageClient';
import { FFmpegMediaProbe } from '../infrastructure/video/FFmpegMediaProbe';
import { FFmpegVideoRenderer } from '../infrastructure/video/FFmpegVideoRenderer';
import { LocalMediaStore } from '../infrastructure/storage/LocalMediaStore';
import { StoryRepository } from '../infrastructure/story/StoryRepository';

export interface CombineOptions {
    inputDir?: string;
    outputDir?: string;
}

/**
 * Factories for the use cases behind each CLI command.
 * Each factory only builds the clients its workflow needs.
 */
export interface Services {
    createOrchestrator(): ChapterVideoOrchestrator;
    createImageRegenerator(): ImageRegenerator;
    createMediaCombiner(options?: CombineOptions): MediaCombiner;
}

/**
 * Wires application services from configuration.
 */
export function createServices(config: Config): Services {
    const store = new LocalMediaStore();
    const stories = new StoryRepository(config.directories.input, config.story);

    const createVideoCreator = (outputDir: string): VideoCreator => {
        const composer = new TimelineComposer(new ClipSynthesizer(new FFmpegMediaProbe()));
        return new VideoCreator(composer, new FFmpegVideoRenderer(), config.video, outputDir);
    };

    const createImageGenerationService = (): ImageGenerationService => {
        const imageClient = new OpenAIImageClient(
            config.openai.apiKey,
            config.openai.imageModel,
            config.openai.baseUrl
        );
        return new ImageGenerationService(imageClient, store, stories, config.directories.images, {
            size: isImageSize(config.openai.imageSize) ? config.openai.imageSize : undefined,
            quality: isImageQuality(config.openai.imageQuality) ? config.openai.imageQuality : undefined,
        });
    };

    return {
        createOrchestrator() {
            const ttsClient = new ElevenLabsTTSClient(
                config.elevenlabs.apiKey,
                config.elevenlabs.voiceId,
                config.elevenlabs.modelId,
                config.elevenlabs.baseUrl
            );

            return new ChapterVideoOrchestrator({
                stories,
                voiceoverService: new VoiceoverService(ttsClient, store, config.directories.audio, {
                    voiceId: config.elevenlabs.voiceId,
                    modelId: config.elevenlabs.modelId,
                }),
                imageGenerationService: createImageGenerationService(),
                videoCreator: createVideoCreator(config.directories.output),
            });
        },

        createImageRegenerator() {
            return new ImageRegenerator(stories, createImageGenerationService());
        },

        createMediaCombiner(options: CombineOptions = {}) {
            return new MediaCombiner(
                store,
                createVideoCreator(options.outputDir ?? config.directories.output),
                options.inputDir ?? config.directories.media
            );
        },
    };
}
