import path from 'path';

/**
 * Kind of media file taking part in a narrated video.
 */
export type MediaKind = 'audio' | 'image';

/**
 * A media file on disk, identified by its stem.
 * Two files match iff their stems are equal.
 */
export interface MediaFile {
    /** Path to the file as found on disk */
    readonly path: string;
    /** File name including extension */
    readonly name: string;
    /** File name without its final extension */
    readonly stem: string;
    readonly kind: MediaKind;
}

/**
 * An audio file and the image with the same stem.
 */
export interface MediaPair {
    readonly audio: MediaFile;
    readonly image: MediaFile;
}

/**
 * Returns the file name without its final extension.
 */
export function getStem(filePath: string): string {
    const name = path.basename(filePath);
    return path.basename(name, path.extname(name));
}

/**
 * Creates a MediaFile reference for a path.
 */
export function createMediaFile(filePath: string, kind: MediaKind): MediaFile {
    return Object.freeze({
        path: filePath,
        name: path.basename(filePath),
        stem: getStem(filePath),
        kind,
    });
}

/**
 * Creates a pair from an audio and an image file with identical stems.
 */
export function createMediaPair(audio: MediaFile, image: MediaFile): MediaPair {
    if (audio.kind !== 'audio') {
        throw new Error(`Expected an audio file, got ${audio.kind} file ${audio.name}`);
    }
    if (image.kind !== 'image') {
        throw new Error(`Expected an image file, got ${image.kind} file ${image.name}`);
    }
    if (audio.stem !== image.stem) {
        throw new Error(`Cannot pair ${audio.name} with ${image.name}: stems differ`);
    }

    return Object.freeze({ audio, image });
}
