#!/usr/bin/env node
import { loadConfig } from './config';
import { createCli } from './presentation/cli';
import { reportError } from './presentation/errorReporter';

async function main(): Promise<void> {
    console.log('🎬 Chapter Narrator');

    const config = loadConfig();
    await createCli(config).parseAsync(process.argv);
}

main().catch((error: unknown) => {
    process.exitCode = reportError(error);
});
