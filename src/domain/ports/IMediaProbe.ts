/**
 * ProbedAudio is an audio file whose duration has been decoded.
 */
export interface ProbedAudio {
    path: string;
    /** Duration in seconds as reported by the decoder */
    durationSeconds: number;
}

/**
 * ProbedImage is an image file that has been opened successfully.
 */
export interface ProbedImage {
    path: string;
    width: number;
    height: number;
}

/**
 * IMediaProbe - Port for decoding media file metadata.
 * Implementations: FFmpegMediaProbe
 */
export interface IMediaProbe {
    /**
     * Decodes an audio file and reports its duration.
     * @throws MediaReadError if the file cannot be decoded
     */
    probeAudio(filePath: string): Promise<ProbedAudio>;

    /**
     * Opens an image file and reports its dimensions.
     * @throws MediaReadError if the file cannot be decoded
     */
    probeImage(filePath: string): Promise<ProbedImage>;
}
