import { VideoCreator } from './VideoCreator';
import { LocalMediaStore } from '../infrastructure/storage/LocalMediaStore';
import { MediaPair } from '../domain/entities/MediaAsset';
import { NoMatchingMediaError } from '../domain/errors';
import { pairMediaFiles } from '../domain/services/MediaPairing';

export const AUDIO_EXTENSION = '.mp3';
export const IMAGE_EXTENSION = '.jpg';
export const DEFAULT_COMBINED_NAME = 'combined_video.mp4';

/**
 * Combines pre-existing audio and image files found in one directory into a video.
 * Files are matched by stem and ordered naturally (part2 before part10).
 */
export class MediaCombiner {
    constructor(
        private readonly store: LocalMediaStore,
        private readonly videoCreator: VideoCreator,
        private readonly inputDir: string
    ) { }

    /**
     * Finds audio/image pairs with identical stems.
     * Audio files without an image are reported and skipped.
     */
    async findMatchingFiles(): Promise<MediaPair[]> {
        const audioFiles = await this.store.listFiles(this.inputDir, AUDIO_EXTENSION, 'audio');
        const imageFiles = await this.store.listFiles(this.inputDir, IMAGE_EXTENSION, 'image');

        const { pairs, unmatchedAudio } = pairMediaFiles(audioFiles, imageFiles);
        for (const audio of unmatchedAudio) {
            console.warn(`⚠️  Warning: No matching image for ${audio.name}`);
        }

        return pairs;
    }

    /**
     * Combines every matching pair into a single video.
     * @throws NoMatchingMediaError if no pair is found; nothing is encoded then
     * @returns The path of the written video
     */
    async combineAll(outputName: string = DEFAULT_COMBINED_NAME): Promise<string> {
        console.log('\n🔍 Finding matching media files...');
        const pairs = await this.findMatchingFiles();

        if (pairs.length === 0) {
            throw new NoMatchingMediaError(this.inputDir);
        }

        console.log(`\n📂 Found ${pairs.length} matching pairs`);
        return this.videoCreator.createVideoFromPairs(pairs, outputName);
    }
}
