/**
 * Splits chapter text into paragraphs on blank lines.
 * Paragraphs are trimmed; empty ones are dropped.
 */
export function splitIntoParagraphs(text: string): string[] {
    return text
        .replace(/\r\n/g, '\n')
        .split('\n\n')
        .map((paragraph) => paragraph.trim())
        .filter((paragraph) => paragraph.length > 0);
}

/**
 * Builds the image prompt for a paragraph from the chapter's base prompt.
 */
export function buildImagePrompt(basePrompt: string, paragraph: string): string {
    return `${basePrompt} Context: ${paragraph}`;
}
