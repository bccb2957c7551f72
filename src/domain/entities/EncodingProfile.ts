/**
 * EncodingProfile holds the codec and quality parameters of one encode.
 * Values are passed through to ffmpeg verbatim.
 */
export interface EncodingProfile {
    /** Output frame rate */
    readonly fps: number;
    /** Video codec, e.g. libx264 */
    readonly videoCodec: string;
    /** Encoder preset, e.g. veryslow */
    readonly preset: string;
    /** Audio codec, e.g. aac */
    readonly audioCodec: string;
    /** Audio bitrate, e.g. 320k */
    readonly audioBitrate: string;
    /** Constant rate factor (lower is better quality) */
    readonly crf: number;
    /** Pixel format, e.g. yuv420p */
    readonly pixelFormat: string;
    /** Canvas width every still is fitted onto */
    readonly width: number;
    /** Canvas height every still is fitted onto */
    readonly height: number;
}

/**
 * Creates a frozen EncodingProfile after checking the numeric fields.
 */
export function createEncodingProfile(params: EncodingProfile): EncodingProfile {
    if (!(params.fps > 0)) {
        throw new Error('Encoding fps must be positive');
    }
    if (params.crf < 0) {
        throw new Error('Encoding crf must be non-negative');
    }
    if (!Number.isInteger(params.width) || params.width <= 0 || params.width % 2 !== 0) {
        throw new Error('Encoding width must be a positive even integer');
    }
    if (!Number.isInteger(params.height) || params.height <= 0 || params.height % 2 !== 0) {
        throw new Error('Encoding height must be a positive even integer');
    }
    if (!params.videoCodec.trim() || !params.audioCodec.trim()) {
        throw new Error('Encoding codecs cannot be empty');
    }

    return Object.freeze({ ...params });
}
