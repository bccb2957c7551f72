import { ClipSynthesizer } from '../../../src/application/services/ClipSynthesizer';
import { TimelineComposer } from '../../../src/application/services/TimelineComposer';
import { IMediaProbe, ProbedAudio, ProbedImage } from '../../../src/domain/ports/IMediaProbe';
import { MediaReadError } from '../../../src/domain/errors';
import { createMediaFile, createMediaPair } from '../../../src/domain/entities/MediaAsset';

function createProbe(durations: Record<string, number>): jest.Mocked<IMediaProbe> {
    return {
        probeAudio: jest.fn<Promise<ProbedAudio>, [string]>(async (path) => {
            if (!(path in durations)) {
                throw new MediaReadError(path, 'Invalid data found when processing input');
            }
            return { path, durationSeconds: durations[path] };
        }),
        probeImage: jest.fn<Promise<ProbedImage>, [string]>(async (path) => ({ path, width: 640, height: 480 })),
    };
}

describe('ClipSynthesizer', () => {
    it('should hold the image for exactly the audio duration', async () => {
        const synthesizer = new ClipSynthesizer(createProbe({ '/m/a.mp3': 3.5 }));

        const clip = await synthesizer.createClip('/m/a.mp3', '/m/a.jpg');

        expect(clip).toEqual({ imagePath: '/m/a.jpg', audioPath: '/m/a.mp3', durationSeconds: 3.5 });
    });

    it('should not probe the image when the audio cannot be read', async () => {
        const probe = createProbe({});
        const synthesizer = new ClipSynthesizer(probe);

        await expect(synthesizer.createClip('/m/bad.mp3', '/m/bad.jpg')).rejects.toBeInstanceOf(MediaReadError);
        expect(probe.probeImage).not.toHaveBeenCalled();
    });

    it('should propagate image read failures', async () => {
        const probe = createProbe({ '/m/a.mp3': 1 });
        probe.probeImage.mockRejectedValueOnce(new MediaReadError('/m/a.jpg', 'no decodable image'));
        const synthesizer = new ClipSynthesizer(probe);

        await expect(synthesizer.createClip('/m/a.mp3', '/m/a.jpg')).rejects.toThrow(
            'Failed to read media file /m/a.jpg: no decodable image'
        );
    });
});

describe('TimelineComposer', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should keep input order and sum the durations', async () => {
        const composer = new TimelineComposer(new ClipSynthesizer(createProbe({
            '/m/1.mp3': 2,
            '/m/2.mp3': 3.25,
            '/m/3.mp3': 1.5,
        })));

        const timeline = await composer.compose([
            { imagePath: '/m/1.png', audioPath: '/m/1.mp3' },
            { imagePath: '/m/2.png', audioPath: '/m/2.mp3' },
            { imagePath: '/m/3.png', audioPath: '/m/3.mp3' },
        ]);

        expect(timeline.clips.map((c) => c.imagePath)).toEqual(['/m/1.png', '/m/2.png', '/m/3.png']);
        expect(timeline.clips.map((c) => c.durationSeconds)).toEqual([2, 3.25, 1.5]);
        expect(timeline.totalDurationSeconds).toBe(6.75);
    });

    it('should return an empty timeline for no sources', async () => {
        const composer = new TimelineComposer(new ClipSynthesizer(createProbe({})));

        const timeline = await composer.compose([]);

        expect(timeline.clips).toHaveLength(0);
        expect(timeline.totalDurationSeconds).toBe(0);
    });

    it('should abort at the first unreadable clip', async () => {
        const probe = createProbe({ '/m/1.mp3': 2, '/m/3.mp3': 4 });
        const composer = new TimelineComposer(new ClipSynthesizer(probe));

        await expect(composer.compose([
            { imagePath: '/m/1.png', audioPath: '/m/1.mp3' },
            { imagePath: '/m/2.png', audioPath: '/m/2.mp3' },
            { imagePath: '/m/3.png', audioPath: '/m/3.mp3' },
        ])).rejects.toThrow('Failed to read media file /m/2.mp3');

        expect(probe.probeAudio).not.toHaveBeenCalledWith('/m/3.mp3');
    });

    it('should label progress with the audio stem for pairs', async () => {
        const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const composer = new TimelineComposer(new ClipSynthesizer(createProbe({ '/m/intro.mp3': 1 })));
        const pair = createMediaPair(
            createMediaFile('/m/intro.mp3', 'audio'),
            createMediaFile('/m/intro.jpg', 'image')
        );

        const timeline = await composer.composeFromPairs([pair]);

        expect(timeline.clips[0]).toEqual({ imagePath: '/m/intro.jpg', audioPath: '/m/intro.mp3', durationSeconds: 1 });
        expect(logSpy).toHaveBeenCalledWith('[Clips] (1/1) intro');
    });
});
