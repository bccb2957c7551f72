import path from 'path';
import { ITTSClient } from '../../domain/ports/ITTSClient';
import { LocalMediaStore } from '../../infrastructure/storage/LocalMediaStore';

/**
 * Voice parameters applied to every paragraph of a run.
 */
export interface VoiceSettings {
    voiceId: string;
    modelId: string;
}

/**
 * VoiceoverService narrates paragraphs into scene{index}.mp3 files.
 */
export class VoiceoverService {
    constructor(
        private readonly ttsClient: ITTSClient,
        private readonly store: LocalMediaStore,
        private readonly audioDir: string,
        private readonly voice: VoiceSettings
    ) { }

    getAudioPath(index: number): string {
        return path.join(this.audioDir, `scene${index}.mp3`);
    }

    /**
     * Narrates one paragraph and writes it to disk, overwriting any earlier take.
     */
    async generate(text: string, index: number): Promise<string> {
        const result = await this.ttsClient.synthesize(text, {
            voiceId: this.voice.voiceId,
            modelId: this.voice.modelId,
        });
        return this.store.writeFile(this.getAudioPath(index), result.audioData);
    }

    /**
     * Narrates paragraphs one after another, in order.
     */
    async batchGenerate(paragraphs: readonly string[]): Promise<string[]> {
        console.log('\n🎙️  Generating audio narration...');
        const paths: string[] = [];

        for (const [index, text] of paragraphs.entries()) {
            console.log(`[TTS] (${index + 1}/${paragraphs.length}) Synthesizing paragraph ${index} (${text.length} chars)`);
            paths.push(await this.generate(text, index));
        }

        return paths;
    }
}
