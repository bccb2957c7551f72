/**
 * Pipeline infrastructure for the chapter-to-video workflow.
 * Each step has a single responsibility and runs after the previous one completes.
 */

/**
 * ChapterContext carries all state through the pipeline.
 * Immutable pattern: each step returns a new context.
 */
export interface ChapterContext {
    readonly chapterNumber: number;

    // Story
    readonly paragraphs?: readonly string[];

    // Assets
    readonly audioPaths?: readonly string[];
    readonly imagePaths?: readonly string[];

    // Final
    readonly outputName?: string;
    readonly videoPath?: string;
}

/**
 * Pipeline step interface.
 */
export interface PipelineStep {
    readonly name: string;
    execute(context: ChapterContext): Promise<ChapterContext>;
}

/**
 * Creates initial context for a chapter.
 */
export function createChapterContext(chapterNumber: number, outputName?: string): ChapterContext {
    if (!Number.isInteger(chapterNumber) || chapterNumber < 0) {
        throw new Error('Chapter number must be a non-negative integer');
    }
    return { chapterNumber, outputName };
}

/**
 * Executes a pipeline of steps sequentially.
 */
export async function executePipeline(
    context: ChapterContext,
    steps: readonly PipelineStep[]
): Promise<ChapterContext> {
    let currentContext = context;

    for (const step of steps) {
        console.log(`[Pipeline] Executing ${step.name}...`);
        currentContext = await step.execute(currentContext);
    }

    return currentContext;
}

/**
 * Reads a value a previous step must have produced.
 */
export function requireFromContext<K extends keyof ChapterContext>(
    context: ChapterContext,
    key: K,
    step: string
): NonNullable<ChapterContext[K]> {
    const value = context[key];
    if (value === undefined || value === null) {
        throw new Error(`${step} step requires "${String(key)}" from an earlier step`);
    }
    return value;
}
