import fs from 'fs';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import {
    FFmpegVideoRenderer,
    buildFilterGraph,
    buildOutputOptions,
} from '../../../src/infrastructure/video/FFmpegVideoRenderer';
import { createClip, createTimeline } from '../../../src/domain/entities/Clip';
import { createEncodingProfile } from '../../../src/domain/entities/EncodingProfile';
import { EmptyTimelineError, EncodingError } from '../../../src/domain/errors';

type Handler = (arg?: unknown) => void;

const mockHandlers: Record<string, Handler> = {};
let mockFailure: Error | null = null;

const mockFfmpegInstance = {
    input: jest.fn().mockReturnThis(),
    inputOptions: jest.fn().mockReturnThis(),
    complexFilter: jest.fn().mockReturnThis(),
    outputOptions: jest.fn().mockReturnThis(),
    on: jest.fn(function (this: unknown, event: string, handler: Handler) {
        mockHandlers[event] = handler;
        return this;
    }),
    save: jest.fn(function (this: unknown) {
        setImmediate(() => {
            if (mockFailure) {
                mockHandlers.error(mockFailure);
            } else {
                mockHandlers.end();
            }
        });
        return this;
    }),
};

jest.mock('fluent-ffmpeg', () => jest.fn(() => mockFfmpegInstance));

const profile = createEncodingProfile({
    fps: 24,
    videoCodec: 'libx264',
    preset: 'veryslow',
    crf: 18,
    pixelFormat: 'yuv420p',
    audioCodec: 'aac',
    audioBitrate: '320k',
    width: 1792,
    height: 1024,
});

const timeline = createTimeline([
    createClip({ path: '/images/image_0.png', width: 1792, height: 1024 }, { path: '/audio/scene0.mp3', durationSeconds: 2.5 }),
    createClip({ path: '/images/image_1.png', width: 800, height: 600 }, { path: '/audio/scene1.mp3', durationSeconds: 4 }),
]);

describe('FFmpegVideoRenderer', () => {
    let renderer: FFmpegVideoRenderer;
    let mkdirSpy: jest.SpyInstance;
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
        jest.clearAllMocks();
        mockFailure = null;
        mkdirSpy = jest.spyOn(fs, 'mkdirSync').mockImplementation(() => undefined);
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        renderer = new FFmpegVideoRenderer();
    });

    afterEach(() => {
        mkdirSpy.mockRestore();
        logSpy.mockRestore();
    });

    it('should reject an empty timeline before invoking ffmpeg', async () => {
        await expect(renderer.render(createTimeline([]), '/out/empty.mp4', profile))
            .rejects.toBeInstanceOf(EmptyTimelineError);
        expect(ffmpeg).not.toHaveBeenCalled();
    });

    it('should add a looped still and its narration for every clip in order', async () => {
        await renderer.render(timeline, '/out/chapter_1.mp4', profile);

        expect(mockFfmpegInstance.input.mock.calls).toEqual([
            ['/images/image_0.png'],
            ['/audio/scene0.mp3'],
            ['/images/image_1.png'],
            ['/audio/scene1.mp3'],
        ]);
        expect(mockFfmpegInstance.inputOptions.mock.calls).toEqual([
            [['-loop 1', '-t 2.5']],
            [['-loop 1', '-t 4']],
        ]);
    });

    it('should encode with the filter graph and profile options', async () => {
        const result = await renderer.render(timeline, '/out/chapter_1.mp4', profile);

        expect(result).toBe('/out/chapter_1.mp4');
        expect(mockFfmpegInstance.complexFilter).toHaveBeenCalledWith(
            buildFilterGraph(timeline, profile),
            ['vout', 'aout']
        );
        expect(mockFfmpegInstance.outputOptions).toHaveBeenCalledWith(buildOutputOptions(profile));
        expect(mockFfmpegInstance.save).toHaveBeenCalledWith('/out/chapter_1.mp4');
    });

    it('should create the destination directory', async () => {
        await renderer.render(timeline, '/out/videos/chapter_1.mp4', profile);

        expect(mkdirSpy).toHaveBeenCalledWith(path.dirname('/out/videos/chapter_1.mp4'), { recursive: true });
    });

    it('should report an unwritable destination as EncodingError', async () => {
        mkdirSpy.mockImplementation(() => {
            throw new Error('EACCES: permission denied');
        });

        await expect(renderer.render(timeline, '/locked/out.mp4', profile)).rejects.toThrow(
            'Failed to encode /locked/out.mp4: EACCES: permission denied'
        );
        expect(ffmpeg).not.toHaveBeenCalled();
    });

    it('should wrap encoder failures in EncodingError', async () => {
        mockFailure = new Error('Unknown encoder \'libx999\'');

        const result = renderer.render(timeline, '/out/chapter_1.mp4', profile);

        await expect(result).rejects.toBeInstanceOf(EncodingError);
        await expect(result).rejects.toThrow('Failed to encode /out/chapter_1.mp4: Unknown encoder \'libx999\'');
    });
});

describe('buildFilterGraph', () => {
    it('should fit each still onto the canvas and normalise its audio', () => {
        const filters = buildFilterGraph(timeline, profile);

        expect(filters).toEqual([
            '[0:v]scale=1792:1024:force_original_aspect_ratio=decrease,pad=1792:1024:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=24,format=yuv420p[v0]',
            '[1:a]aformat=sample_rates=44100:channel_layouts=stereo[a0]',
            '[2:v]scale=1792:1024:force_original_aspect_ratio=decrease,pad=1792:1024:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=24,format=yuv420p[v1]',
            '[3:a]aformat=sample_rates=44100:channel_layouts=stereo[a1]',
            '[v0][a0][v1][a1]concat=n=2:v=1:a=1[vout][aout]',
        ]);
    });
});

describe('buildOutputOptions', () => {
    it('should map every profile field to an ffmpeg option', () => {
        expect(buildOutputOptions(profile)).toEqual([
            '-c:v libx264',
            '-preset veryslow',
            '-crf 18',
            '-pix_fmt yuv420p',
            '-r 24',
            '-c:a aac',
            '-b:a 320k',
            '-movflags +faststart',
            '-y',
        ]);
    });
});
