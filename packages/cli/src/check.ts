/**
 * The `check` command: load and validate without serving.
 */

import { resolve } from 'path';
import pc from 'picocolors';
import { discoverManifest, loadManifest, validateParity } from '@flashless/manifest';
import { PREFIX, formatValidationWarnings } from './messages.js';
import type { CheckOptions } from './types.js';

/**
 * Prints the manifest path and any parity misses.
 *
 * @returns 1 when `strict` is set and validation found anything, otherwise 0
 * @throws \{FlashlessError\} When the manifest cannot be found or loaded
 */
export async function runCheck(options: CheckOptions): Promise<number> {
    const projectDir = resolve(options.projectDir);
    const manifestPath = await discoverManifest(projectDir, options.manifest);
    const manifest = await loadManifest(manifestPath, projectDir, {
        fixturesOverride: options.fixtures,
        allowAbsolutePaths: options.allowAbsolutePaths,
    });
    const validation = await validateParity(manifest);

    console.log(`${PREFIX} Manifest: ${manifest.sourcePath}`);
    if (!validation.hasErrors) {
        console.log(pc.green(`${PREFIX} No validation problems found.`));
        return 0;
    }

    for (const line of formatValidationWarnings(validation)) {
        console.log(pc.yellow(line));
    }
    return options.strict ? 1 : 0;
}
