import { ClipSource, TimelineComposer } from './services/TimelineComposer';
import { IVideoRenderer } from '../domain/ports/IVideoRenderer';
import { EncodingProfile } from '../domain/entities/EncodingProfile';
import { Timeline } from '../domain/entities/Clip';
import { MediaPair } from '../domain/entities/MediaAsset';
import { LengthMismatchError } from '../domain/errors';
import { resolveOutputPath } from '../domain/services/OutputPath';

/**
 * VideoCreator composes image/audio files into a timeline and encodes it.
 */
export class VideoCreator {
    constructor(
        private readonly composer: TimelineComposer,
        private readonly renderer: IVideoRenderer,
        private readonly profile: EncodingProfile,
        private readonly outputDir: string
    ) { }

    /**
     * Creates a video from parallel image and audio lists.
     * @throws LengthMismatchError if the lists differ in length
     * @returns The path of the written video
     */
    async createVideo(imagePaths: readonly string[], audioPaths: readonly string[], outputName: string): Promise<string> {
        if (imagePaths.length !== audioPaths.length) {
            throw new LengthMismatchError(imagePaths.length, audioPaths.length);
        }

        const sources: ClipSource[] = imagePaths.map((imagePath, i) => ({
            imagePath,
            audioPath: audioPaths[i],
        }));

        return this.encode(sources, outputName);
    }

    /**
     * Creates a video from stem-matched pairs.
     */
    async createVideoFromPairs(pairs: readonly MediaPair[], outputName: string): Promise<string> {
        console.log('\n🎬 Creating video clips...');
        const timeline = await this.composer.composeFromPairs(pairs);
        return this.write(timeline, outputName);
    }

    private async encode(sources: ClipSource[], outputName: string): Promise<string> {
        console.log('\n🎬 Creating video...');
        const timeline = await this.composer.compose(sources);
        return this.write(timeline, outputName);
    }

    private async write(timeline: Timeline, outputName: string): Promise<string> {
        const destination = resolveOutputPath(outputName, this.outputDir);
        console.log('\n💾 Writing final video...');
        return this.renderer.render(timeline, destination, this.profile);
    }
}
