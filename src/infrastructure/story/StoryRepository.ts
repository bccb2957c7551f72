import fs from 'fs';
import path from 'path';
import { NotFoundError } from '../../domain/errors';
import { formatFilenamePattern } from '../../domain/services/OutputPath';
import { isErrnoException } from '../storage/LocalMediaStore';

/**
 * File name patterns of a story, with `{}` standing for the chapter number.
 */
export interface StoryPatterns {
    chapterFilePattern: string;
    basePromptFilePattern: string;
    outputFilenamePattern: string;
}

/**
 * Reads chapter texts and base prompts from the input directory.
 */
export class StoryRepository {
    constructor(
        private readonly inputDir: string,
        private readonly patterns: StoryPatterns
    ) { }

    getChapterPath(chapterNumber: number): string {
        return path.join(this.inputDir, formatFilenamePattern(this.patterns.chapterFilePattern, chapterNumber));
    }

    getBasePromptPath(chapterNumber: number): string {
        return path.join(this.inputDir, formatFilenamePattern(this.patterns.basePromptFilePattern, chapterNumber));
    }

    /**
     * Output video file name for a chapter, e.g. `chapter_3.mp4`.
     */
    getOutputFilename(chapterNumber: number): string {
        return formatFilenamePattern(this.patterns.outputFilenamePattern, chapterNumber);
    }

    /**
     * Reads the full text of a chapter.
     * @throws NotFoundError if the chapter file does not exist
     */
    async readChapter(chapterNumber: number): Promise<string> {
        const filePath = this.getChapterPath(chapterNumber);
        const text = await readTextIfExists(filePath);
        if (text === null) {
            throw new NotFoundError(`Chapter ${chapterNumber} not found at ${filePath}`);
        }
        return text;
    }

    /**
     * Reads the stripped base prompt of a chapter, or null when the file is absent or blank.
     */
    async readBasePrompt(chapterNumber: number): Promise<string | null> {
        const text = await readTextIfExists(this.getBasePromptPath(chapterNumber));
        const prompt = text?.trim();
        return prompt ? prompt : null;
    }
}

async function readTextIfExists(filePath: string): Promise<string | null> {
    try {
        return await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return null;
        }
        throw error;
    }
}
