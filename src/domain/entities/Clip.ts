import { ProbedAudio, ProbedImage } from '../ports/IMediaProbe';

/**
 * Clip is a still image held for exactly the duration of its soundtrack.
 * It only lives between composition and encoding.
 */
export interface Clip {
    readonly imagePath: string;
    readonly audioPath: string;
    /** Always the decoded audio duration, in seconds */
    readonly durationSeconds: number;
}

/**
 * Timeline is the ordered, gapless sequence of clips for one output file.
 */
export interface Timeline {
    readonly clips: readonly Clip[];
    readonly totalDurationSeconds: number;
}

/**
 * Builds a clip from a decoded image and audio file.
 */
export function createClip(image: ProbedImage, audio: ProbedAudio): Clip {
    if (!(audio.durationSeconds > 0)) {
        throw new Error(`Audio ${audio.path} has no playable duration`);
    }

    return Object.freeze({
        imagePath: image.path,
        audioPath: audio.path,
        durationSeconds: audio.durationSeconds,
    });
}

/**
 * Concatenates clips in the given order.
 */
export function createTimeline(clips: readonly Clip[]): Timeline {
    return Object.freeze({
        clips: Object.freeze([...clips]),
        totalDurationSeconds: clips.reduce((sum, clip) => sum + clip.durationSeconds, 0),
    });
}
