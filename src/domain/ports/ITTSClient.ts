/**
 * TTSResult represents the output from a TTS synthesis call.
 */
export interface TTSResult {
    /** Encoded audio bytes */
    audioData: Buffer;
    /** Container format of audioData */
    format: 'mp3';
}

/**
 * TTSOptions for customizing synthesis.
 */
export interface TTSOptions {
    /** Optional voice ID override */
    voiceId?: string;
    /** Optional model ID override */
    modelId?: string;
}

/**
 * ITTSClient - Port for Text-to-Speech services.
 * Implementations: ElevenLabsTTSClient
 */
export interface ITTSClient {
    /**
     * Synthesizes text to speech audio.
     * @param text The text to synthesize
     * @param options Optional voice and model overrides
     */
    synthesize(text: string, options?: TTSOptions): Promise<TTSResult>;
}
