import { PipelineStep, ChapterContext, requireFromContext } from '../PipelineInfrastructure';
import { VoiceoverService } from '../../services/VoiceoverService';

export class VoiceoverStep implements PipelineStep {
    readonly name = 'Voiceover';

    constructor(private readonly voiceoverService: VoiceoverService) { }

    async execute(context: ChapterContext): Promise<ChapterContext> {
        const paragraphs = requireFromContext(context, 'paragraphs', this.name);
        const audioPaths = await this.voiceoverService.batchGenerate(paragraphs);
        return { ...context, audioPaths };
    }
}
