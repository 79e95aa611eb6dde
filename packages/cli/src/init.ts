/**
 * The `init-manifest` command: writes a starter manifest.
 */

import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { FlashlessError, FlashlessErrorCode } from '@flashless/manifest';
import type { InitManifestOptions } from './types.js';

/** Sits one level above the module, in `src/` and in the build output alike. */
export const MANIFEST_TEMPLATE_URL = new URL('../templates/flashless.manifest.json', import.meta.url);

/**
 * The manifest template shipped with the CLI, as text.
 */
export async function readManifestTemplate(): Promise<string> {
    return readFile(MANIFEST_TEMPLATE_URL, 'utf-8');
}

/**
 * Writes the manifest template.
 *
 * @returns Absolute path of the written file
 * @throws \{FlashlessError\} `FILE_EXISTS` when the file exists and `force` is not set
 */
export async function initManifest(options: InitManifestOptions): Promise<string> {
    const outputPath = resolve(options.cwd ?? process.cwd(), options.output);
    const template = await readManifestTemplate();

    try {
        await writeFile(outputPath, template, {
            encoding: 'utf-8',
            flag: options.force ? 'w' : 'wx',
        });
    } catch (error) {
        if (isExistsError(error)) {
            throw new FlashlessError(
                FlashlessErrorCode.FILE_EXISTS,
                `File exists: ${options.output}. Use '--force' to overwrite or choose another '--output'.`,
            );
        }
        throw error;
    }

    return outputPath;
}

function isExistsError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
