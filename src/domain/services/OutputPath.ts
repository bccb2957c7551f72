import path from 'path';

/**
 * Resolves where an encode is written.
 * A name containing a path separator is used verbatim; a bare file name lands in outputDir.
 */
export function resolveOutputPath(outputName: string, outputDir: string): string {
    if (outputName.includes('/') || outputName.includes(path.sep)) {
        return outputName;
    }
    return path.join(outputDir, outputName);
}

/**
 * Fills the `{}` placeholder of a file name pattern, e.g. `chapter_{}.mp4`.
 */
export function formatFilenamePattern(pattern: string, value: number): string {
    if (!pattern.includes('{}')) {
        throw new Error(`File name pattern "${pattern}" has no {} placeholder`);
    }
    return pattern.split('{}').join(String(value));
}
