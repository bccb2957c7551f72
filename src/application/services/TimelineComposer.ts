import path from 'path';
import { Clip, Timeline, createTimeline } from '../../domain/entities/Clip';
import { MediaPair } from '../../domain/entities/MediaAsset';
import { ClipSynthesizer } from './ClipSynthesizer';

/**
 * One clip to be synthesized, in timeline order.
 */
export interface ClipSource {
    imagePath: string;
    audioPath: string;
    /** Shown in progress output */
    label?: string;
}

/**
 * TimelineComposer synthesizes clips one after another and concatenates them.
 */
export class TimelineComposer {
    constructor(private readonly clipSynthesizer: ClipSynthesizer) { }

    /**
     * Builds the timeline in input order. Any failing clip aborts the whole composition.
     */
    async compose(sources: readonly ClipSource[]): Promise<Timeline> {
        const clips: Clip[] = [];
        const total = sources.length;

        for (const [i, source] of sources.entries()) {
            const label = source.label ?? path.basename(source.audioPath);
            console.log(`[Clips] (${i + 1}/${total}) ${label}`);
            clips.push(await this.clipSynthesizer.createClip(source.audioPath, source.imagePath));
        }

        const timeline = createTimeline(clips);
        console.log(`[Clips] Composed ${clips.length} clips, ${timeline.totalDurationSeconds.toFixed(2)}s total`);
        return timeline;
    }

    async composeFromPairs(pairs: readonly MediaPair[]): Promise<Timeline> {
        return this.compose(pairs.map((pair) => ({
            imagePath: pair.image.path,
            audioPath: pair.audio.path,
            label: pair.audio.stem,
        })));
    }
}
