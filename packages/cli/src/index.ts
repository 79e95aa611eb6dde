/**
 * `@flashless/cli` - Command line interface for flashless.
 *
 * - `run` serves a project's UI and fixtures until interrupted
 * - `init-manifest` writes a starter manifest
 * - `check` validates a manifest without serving
 *
 * @packageDocumentation
 */

import { CommanderError } from 'commander';
import { isFlashlessError } from '@flashless/manifest';
import { createProgram, type CommandHandlers } from './cli.js';
import { runCheck } from './check.js';
import { initManifest } from './init.js';
import { PREFIX, printError } from './messages.js';
import { runPreview } from './preview.js';

export { createProgram, parseInterval, parseMode, parsePort, parseRequestLog } from './cli.js';
export type { CommandHandlers } from './cli.js';
export { runCheck } from './check.js';
export { initManifest, readManifestTemplate } from './init.js';
export { formatValidationWarnings } from './messages.js';
export { preparePreview, previewUrl, runPreview, type PreparedPreview } from './preview.js';
export { writeReport, sha256File, type PreviewReport, type WriteReportOptions } from './report.js';
export type { CheckOptions, InitManifestOptions, PreviewOptions } from './types.js';

/**
 * Parses `argv` and runs the selected command.
 *
 * @param argv - Full argument vector, including the node and script entries
 * @param handlers - Replaces the default command actions
 * @returns Process exit code: 0 on success, 1 for a failed strict check or a
 * usage error, 2 for a {@link FlashlessError}
 */
export async function main(
    argv: readonly string[] = process.argv,
    handlers?: Partial<CommandHandlers>,
): Promise<number> {
    let exitCode = 0;

    const program = createProgram({
        run: runPreview,
        async initManifest(options) {
            const outputPath = await initManifest(options);
            console.log(`${PREFIX} Wrote manifest template: ${outputPath}`);
        },
        async check(options) {
            exitCode = await runCheck(options);
        },
        ...handlers,
    });

    try {
        await program.parseAsync([...argv]);
        return exitCode;
    } catch (error) {
        if (isFlashlessError(error)) {
            printError(error.message);
            return 2;
        }
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }
}
