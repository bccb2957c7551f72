/**
 * Application-specific error with a process exit code.
 */
export class AppError extends Error {
    constructor(
        public readonly exitCode: number,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AppError';
    }
}

/**
 * A required chapter, paragraph, or directory is missing.
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(2, message);
        this.name = 'NotFoundError';
    }
}

/**
 * The chapter has no base prompt for image generation.
 */
export class MissingBasePromptError extends NotFoundError {
    constructor(
        public readonly chapterNumber: number,
        public readonly path: string
    ) {
        super(`Base prompt file not found for chapter ${chapterNumber} at ${path}`);
        this.name = 'MissingBasePromptError';
    }
}

/**
 * An audio or image asset could not be decoded.
 */
export class MediaReadError extends AppError {
    constructor(
        public readonly path: string,
        reason: string,
        options?: { cause?: unknown }
    ) {
        super(3, `Failed to read media file ${path}: ${reason}`, options);
        this.name = 'MediaReadError';
    }
}

/**
 * Directory scan produced zero audio/image pairs.
 */
export class NoMatchingMediaError extends AppError {
    constructor(public readonly directory: string) {
        super(4, `No matching audio-image pairs found in ${directory}`);
        this.name = 'NoMatchingMediaError';
    }
}

/**
 * The encoder rejected its parameters or could not write the destination.
 */
export class EncodingError extends AppError {
    constructor(
        public readonly destination: string,
        reason: string,
        options?: { cause?: unknown }
    ) {
        super(5, `Failed to encode ${destination}: ${reason}`, options);
        this.name = 'EncodingError';
    }
}

export class EmptyTimelineError extends AppError {
    constructor() {
        super(5, 'Cannot encode a timeline with zero clips');
        this.name = 'EmptyTimelineError';
    }
}

/**
 * Image and audio path lists passed for composition differ in length.
 */
export class LengthMismatchError extends AppError {
    constructor(
        public readonly imageCount: number,
        public readonly audioCount: number
    ) {
        super(6, `Expected as many images as audio files, got ${imageCount} images and ${audioCount} audio files`);
        this.name = 'LengthMismatchError';
    }
}

export class ConfigurationError extends AppError {
    constructor(public readonly problems: string[]) {
        super(78, `Configuration validation failed:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
        this.name = 'ConfigurationError';
    }
}
