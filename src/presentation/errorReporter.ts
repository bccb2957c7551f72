import { AppError } from '../domain/errors';

/**
 * Prints an error for the user and returns the process exit code for it.
 */
export function reportError(err: unknown): number {
    if (err instanceof AppError) {
        console.error(`❌ ${err.name}: ${err.message}`);
        return err.exitCode;
    }

    if (err instanceof Error) {
        console.error(`❌ ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
        return 1;
    }

    console.error(`❌ Unexpected failure: ${String(err)}`);
    return 1;
}
