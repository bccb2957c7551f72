import {
    ChapterContext,
    PipelineDependencies,
    createChapterContext,
    createChapterPipeline,
    executePipeline,
} from './pipelines';

/**
 * ChapterVideoOrchestrator drives the chapter-to-video workflow:
 * read chapter → narrate → illustrate → compose and encode.
 */
export class ChapterVideoOrchestrator {
    constructor(private readonly deps: PipelineDependencies) { }

    /**
     * Runs the full pipeline for one chapter.
     * @param outputName Overrides the configured output file name pattern
     */
    async processChapter(chapterNumber: number, outputName?: string): Promise<ChapterContext> {
        console.log(`\n📖 Processing chapter ${chapterNumber}...`);

        const context = createChapterContext(chapterNumber, outputName);
        const result = await executePipeline(context, createChapterPipeline(this.deps));

        console.log(`\n✅ Chapter ${chapterNumber} video written to ${result.videoPath}`);
        return result;
    }
}
