import { Timeline } from '../entities/Clip';
import { EncodingProfile } from '../entities/EncodingProfile';

/**
 * IVideoRenderer - Port for encoding a timeline into a video file.
 * Implementations: FFmpegVideoRenderer
 */
export interface IVideoRenderer {
    /**
     * Encodes the timeline to the destination, overwriting any existing file.
     * @param timeline Non-empty ordered clips
     * @param destination Output file path; missing parent directories are created
     * @param profile Codec and quality parameters
     * @returns The path written to
     */
    render(timeline: Timeline, destination: string, profile: EncodingProfile): Promise<string>;
}
