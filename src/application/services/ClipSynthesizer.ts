import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { Clip, createClip } from '../../domain/entities/Clip';

/**
 * ClipSynthesizer turns an audio/image file pair into a clip
 * whose duration is the decoded audio duration.
 */
export class ClipSynthesizer {
    constructor(private readonly probe: IMediaProbe) { }

    /**
     * @throws MediaReadError if either file cannot be decoded
     */
    async createClip(audioPath: string, imagePath: string): Promise<Clip> {
        const audio = await this.probe.probeAudio(audioPath);
        const image = await this.probe.probeImage(imagePath);
        return createClip(image, audio);
    }
}
