import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { IVideoRenderer } from '../../domain/ports/IVideoRenderer';
import { Timeline } from '../../domain/entities/Clip';
import { EncodingProfile } from '../../domain/entities/EncodingProfile';
import { EmptyTimelineError, EncodingError } from '../../domain/errors';

/**
 * Encodes a timeline of still-image clips locally using FFmpeg.
 * Requires 'ffmpeg' to be installed in the system.
 */
export class FFmpegVideoRenderer implements IVideoRenderer {
    async render(timeline: Timeline, destination: string, profile: EncodingProfile): Promise<string> {
        if (timeline.clips.length === 0) {
            throw new EmptyTimelineError();
        }

        try {
            fs.mkdirSync(path.dirname(destination), { recursive: true });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new EncodingError(destination, reason, { cause: error });
        }

        console.log(`[FFmpeg] Encoding ${timeline.clips.length} clips (${timeline.totalDurationSeconds.toFixed(2)}s) to ${destination}`);
        await this.runFFmpeg(timeline, destination, profile);
        console.log(`[FFmpeg] Wrote ${destination}`);

        return destination;
    }

    private runFFmpeg(timeline: Timeline, outputPath: string, profile: EncodingProfile): Promise<void> {
        return new Promise((resolve, reject) => {
            const cmd = ffmpeg();

            // Inputs alternate: [2i] looped still, [2i+1] its narration
            timeline.clips.forEach((clip) => {
                cmd.input(clip.imagePath).inputOptions(['-loop 1', `-t ${clip.durationSeconds}`]);
                cmd.input(clip.audioPath);
            });

            cmd.complexFilter(buildFilterGraph(timeline, profile), ['vout', 'aout']);

            cmd.outputOptions(buildOutputOptions(profile));

            cmd
                .on('end', () => resolve())
                .on('error', (err: Error) => reject(new EncodingError(outputPath, err.message, { cause: err })))
                .save(outputPath);
        });
    }
}

/**
 * Builds the filter graph fitting every still onto the canvas and concatenating
 * the clips' video and audio in order.
 */
export function buildFilterGraph(timeline: Timeline, profile: EncodingProfile): string[] {
    const { width, height, fps, pixelFormat } = profile;
    const filters: string[] = [];
    let concatInputs = '';

    timeline.clips.forEach((clip, i) => {
        const imageInput = 2 * i;
        const audioInput = imageInput + 1;

        filters.push(
            `[${imageInput}:v]scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
            `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${fps},format=${pixelFormat}[v${i}]`
        );
        filters.push(`[${audioInput}:a]aformat=sample_rates=44100:channel_layouts=stereo[a${i}]`);
        concatInputs += `[v${i}][a${i}]`;
    });

    filters.push(`${concatInputs}concat=n=${timeline.clips.length}:v=1:a=1[vout][aout]`);
    return filters;
}

export function buildOutputOptions(profile: EncodingProfile): string[] {
    return [
        `-c:v ${profile.videoCodec}`,
        `-preset ${profile.preset}`,
        `-crf ${profile.crf}`,
        `-pix_fmt ${profile.pixelFormat}`,
        `-r ${profile.fps}`,
        `-c:a ${profile.audioCodec}`,
        `-b:a ${profile.audioBitrate}`,
        '-movflags +faststart',
        '-y',
    ];
}
