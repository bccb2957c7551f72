import { Command, InvalidArgumentError } from 'commander';
import { Config, Workflow, validateConfig } from '../config';
import { ConfigurationError } from '../domain/errors';
import { Services, createServices } from './container';
import { DEFAULT_COMBINED_NAME } from '../application/MediaCombiner';

export function parseIndex(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Must be a non-negative integer.');
    }
    return Number.parseInt(value, 10);
}

function ensureConfigured(config: Config, workflow: Workflow): void {
    const errors = validateConfig(config, workflow);
    if (errors.length > 0) {
        throw new ConfigurationError(errors);
    }
}

/**
 * Builds the command-line interface.
 */
export function createCli(config: Config, services: Services = createServices(config)): Command {
    const program = new Command();

    program
        .name('chapter-narrator')
        .description('Turn chapter text into narrated videos')
        .version('1.0.0');

    program
        .command('chapter')
        .description('Narrate, illustrate and encode one chapter')
        .argument('<number>', 'Chapter number', parseIndex)
        .option('-o, --output <name>', 'Output file name or path (default: configured pattern)')
        .action(async (chapterNumber: number, options: { output?: string }) => {
            ensureConfigured(config, 'chapter');
            await services.createOrchestrator().processChapter(chapterNumber, options.output);
        });

    program
        .command('combine')
        .description('Combine matching mp3/jpg files from a directory into one video')
        .option('-i, --input <dir>', 'Directory with the media files (default: configured media dir)')
        .option('-d, --output-dir <dir>', 'Directory for the video (default: configured output dir)')
        .option('-o, --output <name>', 'Output file name or path', DEFAULT_COMBINED_NAME)
        .action(async (options: { input?: string; outputDir?: string; output: string }) => {
            ensureConfigured(config, 'combine');
            const combiner = services.createMediaCombiner({
                inputDir: options.input,
                outputDir: options.outputDir,
            });
            const outputPath = await combiner.combineAll(options.output);
            console.log(`\n✅ Video written to ${outputPath}`);
        });

    program
        .command('regenerate-image')
        .description('Regenerate the image of one paragraph')
        .argument('<chapter>', 'Chapter number', parseIndex)
        .argument('<index>', 'Zero-based paragraph index', parseIndex)
        .action(async (chapterNumber: number, index: number) => {
            ensureConfigured(config, 'regenerate-image');
            await services.createImageRegenerator().regenerateImage(chapterNumber, index);
        });

    return program;
}
