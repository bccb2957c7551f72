import { MediaFile, MediaPair, createMediaPair } from '../entities/MediaAsset';
import { naturalSort } from './NaturalSort';

/**
 * PairingResult of matching audio files against image files.
 */
export interface PairingResult {
    /** Pairs in natural order of the audio stems */
    pairs: MediaPair[];
    /** Audio files with no image of the same stem */
    unmatchedAudio: MediaFile[];
}

/**
 * Pairs every audio file with the image of identical stem.
 * Both lists are sorted naturally by stem first; output follows audio order.
 */
export function pairMediaFiles(audioFiles: readonly MediaFile[], imageFiles: readonly MediaFile[]): PairingResult {
    const sortedAudio = naturalSort(audioFiles, (file) => file.stem);
    const sortedImages = naturalSort(imageFiles, (file) => file.stem);

    const imagesByStem = new Map<string, MediaFile>();
    for (const image of sortedImages) {
        if (!imagesByStem.has(image.stem)) {
            imagesByStem.set(image.stem, image);
        }
    }

    const pairs: MediaPair[] = [];
    const unmatchedAudio: MediaFile[] = [];

    for (const audio of sortedAudio) {
        const image = imagesByStem.get(audio.stem);
        if (image) {
            pairs.push(createMediaPair(audio, image));
        } else {
            unmatchedAudio.push(audio);
        }
    }

    return { pairs, unmatchedAudio };
}
