import ffmpeg from 'fluent-ffmpeg';
import { IMediaProbe, ProbedAudio, ProbedImage } from '../../domain/ports/IMediaProbe';
import { MediaReadError } from '../../domain/errors';

/**
 * Reads media metadata with ffprobe.
 * Requires 'ffprobe' to be installed in the system.
 */
export class FFmpegMediaProbe implements IMediaProbe {
    async probeAudio(filePath: string): Promise<ProbedAudio> {
        const data = await this.ffprobe(filePath);
        const stream = data.streams.find((s) => s.codec_type === 'audio');
        if (!stream) {
            throw new MediaReadError(filePath, 'no audio stream');
        }

        // Prefer the stream's own duration; containers may pad theirs
        const durationSeconds = toSeconds(stream.duration) ?? toSeconds(data.format.duration);
        if (durationSeconds === undefined) {
            throw new MediaReadError(filePath, 'unknown duration');
        }

        return { path: filePath, durationSeconds };
    }

    async probeImage(filePath: string): Promise<ProbedImage> {
        const data = await this.ffprobe(filePath);
        const stream = data.streams.find((s) => s.codec_type === 'video');
        if (!stream || !stream.width || !stream.height) {
            throw new MediaReadError(filePath, 'no decodable image');
        }

        return { path: filePath, width: stream.width, height: stream.height };
    }

    private ffprobe(filePath: string): Promise<ffmpeg.FfprobeData> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err: unknown, data: ffmpeg.FfprobeData) => {
                if (err) {
                    const reason = err instanceof Error ? err.message : String(err);
                    return reject(new MediaReadError(filePath, reason, { cause: err }));
                }
                resolve(data);
            });
        });
    }
}

function toSeconds(value: string | number | undefined): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const seconds = Number(value);
    return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}
