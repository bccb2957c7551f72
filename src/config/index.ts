import dotenv from 'dotenv';
import { EncodingProfile, createEncodingProfile } from '../domain/entities/EncodingProfile';
import {
    IMAGE_QUALITIES,
    IMAGE_SIZES,
    isImageQuality,
    isImageSize,
} from '../domain/ports/IImageClient';
import { ConfigurationError } from '../domain/errors';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 * Loaded once at startup and passed explicitly to the components that need it.
 */
export interface Config {
    readonly directories: {
        /** Chapter texts and base prompts */
        readonly input: string;
        /** Encoded videos */
        readonly output: string;
        /** Generated narration (scene{N}.mp3) */
        readonly audio: string;
        /** Generated images (image_{N}.png) */
        readonly images: string;
        /** Pre-existing mp3/jpg pairs for the combine workflow */
        readonly media: string;
    };

    readonly story: {
        readonly chapterFilePattern: string;
        readonly basePromptFilePattern: string;
        readonly outputFilenamePattern: string;
    };

    // ElevenLabs TTS
    readonly elevenlabs: {
        readonly apiKey: string;
        readonly baseUrl: string;
        readonly voiceId: string;
        readonly modelId: string;
    };

    // OpenAI image generation
    readonly openai: {
        readonly apiKey: string;
        readonly baseUrl: string;
        readonly imageModel: string;
        /** Checked against IMAGE_SIZES by validateConfig */
        readonly imageSize: string;
        /** Checked against IMAGE_QUALITIES by validateConfig */
        readonly imageQuality: string;
    };

    readonly video: EncodingProfile;
}

/**
 * Workflows the CLI can run; each needs a different subset of settings.
 */
export type Workflow = 'chapter' | 'regenerate-image' | 'combine';

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue: number, problems: string[]): number {
    const value = getEnvVar(key, defaultValue.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        problems.push(`Environment variable ${key} must be a number, got: ${value}`);
        return defaultValue;
    }
    return parsed;
}

function loadEncodingProfile(problems: string[]): EncodingProfile | undefined {
    const params: EncodingProfile = {
        fps: getEnvVarNumber('VIDEO_FPS', 24, problems),
        videoCodec: getEnvVar('VIDEO_CODEC', 'libx264'),
        preset: getEnvVar('VIDEO_PRESET', 'veryslow'),
        crf: getEnvVarNumber('VIDEO_QUALITY', 18, problems),
        pixelFormat: getEnvVar('PIXEL_FORMAT', 'yuv420p'),
        audioCodec: getEnvVar('AUDIO_CODEC', 'aac'),
        audioBitrate: getEnvVar('AUDIO_BITRATE', '320k'),
        width: getEnvVarNumber('VIDEO_WIDTH', 1792, problems),
        height: getEnvVarNumber('VIDEO_HEIGHT', 1024, problems),
    };

    try {
        return createEncodingProfile(params);
    } catch (error) {
        problems.push(error instanceof Error ? error.message : String(error));
        return undefined;
    }
}

/**
 * Loads configuration from environment variables.
 * @throws ConfigurationError listing every malformed value
 */
export function loadConfig(): Config {
    const problems: string[] = [];
    const video = loadEncodingProfile(problems);

    if (video === undefined || problems.length > 0) {
        throw new ConfigurationError(problems);
    }

    const config: Config = {
        directories: Object.freeze({
            input: getEnvVar('INPUT_DIR', 'input'),
            output: getEnvVar('OUTPUT_DIR', 'output'),
            audio: getEnvVar('AUDIO_DIR', 'output/audio'),
            images: getEnvVar('IMAGES_DIR', 'output/images'),
            media: getEnvVar('MEDIA_DIR', 'input/media'),
        }),

        story: Object.freeze({
            chapterFilePattern: getEnvVar('CHAPTER_FILE_PATTERN', 'chapter{}.txt'),
            basePromptFilePattern: getEnvVar('BASE_PROMPT_FILE_PATTERN', 'chapter{}_base_prompt.txt'),
            outputFilenamePattern: getEnvVar('OUTPUT_FILENAME_PATTERN', 'chapter_{}.mp4'),
        }),

        elevenlabs: Object.freeze({
            apiKey: getEnvVar('ELEVENLABS_API_KEY', ''),
            baseUrl: getEnvVar('ELEVENLABS_BASE_URL', 'https://api.elevenlabs.io'),
            voiceId: getEnvVar('ELEVENLABS_VOICE_ID', ''),
            modelId: getEnvVar('ELEVENLABS_MODEL_ID', 'eleven_multilingual_v2'),
        }),

        openai: Object.freeze({
            apiKey: getEnvVar('OPENAI_API_KEY', ''),
            baseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com'),
            imageModel: getEnvVar('OPENAI_IMAGE_MODEL', 'dall-e-3'),
            imageSize: getEnvVar('OPENAI_IMAGE_SIZE', '1792x1024'),
            imageQuality: getEnvVar('OPENAI_IMAGE_QUALITY', 'standard'),
        }),

        video,
    };

    return Object.freeze(config);
}

/**
 * Validates that the settings a workflow needs are present.
 */
export function validateConfig(config: Config, workflow: Workflow): string[] {
    const errors: string[] = [];

    if (workflow === 'chapter') {
        if (!config.elevenlabs.apiKey) {
            errors.push('ELEVENLABS_API_KEY is required for narration');
        }
        if (!config.elevenlabs.voiceId) {
            errors.push('ELEVENLABS_VOICE_ID is required for narration');
        }
    }

    if (workflow === 'chapter' || workflow === 'regenerate-image') {
        if (!config.openai.apiKey) {
            errors.push('OPENAI_API_KEY is required for image generation');
        }
        if (!isImageSize(config.openai.imageSize)) {
            errors.push(`OPENAI_IMAGE_SIZE must be one of ${IMAGE_SIZES.join(', ')}, got: ${config.openai.imageSize}`);
        }
        if (!isImageQuality(config.openai.imageQuality)) {
            errors.push(`OPENAI_IMAGE_QUALITY must be one of ${IMAGE_QUALITIES.join(', ')}, got: ${config.openai.imageQuality}`);
        }
    }

    return errors;
}
